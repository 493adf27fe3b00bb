import { DataSource } from 'typeorm';
import { HealthService } from './health.service';

describe('HealthService', () => {
  const createService = (query: jest.Mock) =>
    new HealthService({ query } as unknown as DataSource);

  it('should report healthy when the database answers', async () => {
    const query = jest.fn().mockResolvedValue([{ '?column?': 1 }]);

    await expect(createService(query).checkDatabaseHealth()).resolves.toEqual({
      status: 'healthy',
    });
    expect(query).toHaveBeenCalledWith('SELECT 1');
  });

  it('should report unhealthy without leaking the driver error', async () => {
    const query = jest
      .fn()
      .mockRejectedValue(new Error('connect ECONNREFUSED 10.0.0.5:5432'));

    await expect(createService(query).checkDatabaseHealth()).resolves.toEqual({
      status: 'unhealthy',
      error: 'Database unavailable',
    });
  });
});

import { Injectable, Logger } from '@nestjs/common';
import { DataSource } from 'typeorm';

/**
 * Health Check Service
 *
 * Used by load balancers to verify that the ledger database answers.
 */
@Injectable()
export class HealthService {
  private readonly logger = new Logger(HealthService.name);

  constructor(private readonly dataSource: DataSource) {}

  async checkDatabaseHealth(): Promise<{
    status: 'healthy' | 'unhealthy';
    error?: string;
  }> {
    try {
      await this.dataSource.query('SELECT 1');
      return { status: 'healthy' };
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      this.logger.error(`[HEALTH] Database check failed: ${message}`);
      return { status: 'unhealthy', error: 'Database unavailable' };
    }
  }
}

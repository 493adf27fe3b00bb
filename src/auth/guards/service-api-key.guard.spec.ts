import { ExecutionContext, UnauthorizedException } from '@nestjs/common';
import { ServiceApiKeyGuard } from './service-api-key.guard';
import { createTestConfigService } from '../../../test/utils/test-helpers';
import { SERVICE_API_KEY } from '../../../test/utils/constants';

describe('ServiceApiKeyGuard', () => {
  const guard = new ServiceApiKeyGuard(createTestConfigService());

  const contextWith = (authorization?: string): ExecutionContext => {
    const request = { headers: { authorization } };
    const context: Partial<ExecutionContext> = {
      switchToHttp: () => ({
        getRequest: <T>() => request as T,
        getResponse: <T>() => ({}) as T,
        getNext: <T>() => (() => undefined) as T,
      }),
    };
    return context as ExecutionContext;
  };

  it('should accept the configured key', () => {
    expect(guard.canActivate(contextWith(`Bearer ${SERVICE_API_KEY}`))).toBe(
      true,
    );
  });

  it('should reject a missing header', () => {
    expect(() => guard.canActivate(contextWith())).toThrow(
      new UnauthorizedException('Missing or invalid service API key'),
    );
  });

  it('should reject a non-bearer scheme', () => {
    expect(() =>
      guard.canActivate(contextWith(`Basic ${SERVICE_API_KEY}`)),
    ).toThrow('Missing or invalid service API key');
  });

  it('should reject a wrong key', () => {
    expect(() =>
      guard.canActivate(contextWith('Bearer not-the-service-key')),
    ).toThrow('Invalid service API key');
  });
});

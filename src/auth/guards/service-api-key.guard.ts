import {
  Injectable,
  CanActivate,
  ExecutionContext,
  UnauthorizedException,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Request } from 'express';
import { AllConfigType } from '../../config/config.type';

/**
 * Service API Key Guard
 *
 * Protects the ingestion endpoints with a shared key sent as
 * `Authorization: Bearer <SERVICE_API_KEY>`. The key is never logged.
 */
@Injectable()
export class ServiceApiKeyGuard implements CanActivate {
  constructor(private configService: ConfigService<AllConfigType>) {}

  canActivate(context: ExecutionContext): boolean {
    const request = context.switchToHttp().getRequest<Request>();
    const authHeader = request.headers.authorization;

    if (!authHeader || !authHeader.startsWith('Bearer ')) {
      throw new UnauthorizedException('Missing or invalid service API key');
    }

    const providedKey = authHeader.substring(7); // Remove 'Bearer '
    const expectedKey = this.configService.getOrThrow('app.serviceApiKey', {
      infer: true,
    });

    if (providedKey !== expectedKey) {
      throw new UnauthorizedException('Invalid service API key');
    }

    return true;
  }
}

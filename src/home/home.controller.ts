import { Controller, Get } from '@nestjs/common';
import { ApiTags, ApiOperation, ApiOkResponse } from '@nestjs/swagger';

import { HomeService } from './home.service';
import { HealthService } from './health.service';

@ApiTags('Home')
@Controller()
export class HomeController {
  constructor(
    private service: HomeService,
    private healthService: HealthService,
  ) {}

  @Get()
  @ApiOperation({
    summary: 'Get Application Information',
    description: 'Name of the running API. This is a public endpoint.',
  })
  @ApiOkResponse({
    description: 'Application information',
    schema: {
      type: 'object',
      properties: {
        name: { type: 'string', example: 'Card Intake API' },
      },
    },
  })
  appInfo() {
    return this.service.appInfo();
  }

  @Get('health/database')
  @ApiOperation({
    summary: 'Database Health Check',
    description: 'Checks that the processed-file ledger database answers.',
  })
  @ApiOkResponse({
    description: 'Database health status',
    schema: {
      type: 'object',
      properties: {
        status: { type: 'string', example: 'healthy' },
        error: { type: 'string', nullable: true },
      },
    },
  })
  async databaseHealth() {
    return this.healthService.checkDatabaseHealth();
  }
}

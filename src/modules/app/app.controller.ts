import { Controller, Get } from '@nestjs/common';
import { ApiTags, ApiOperation, ApiResponse } from '@nestjs/swagger';
import { AppService } from './app.service';
import { DatabaseInitService } from '../../config/database-init.service';

export interface HealthStatus {
  status: 'healthy' | 'unhealthy';
  timestamp: string;
  database: 'connected' | 'disconnected';
}

@ApiTags('app')
@Controller()
export class AppController {
  constructor(
    private readonly appService: AppService,
    private readonly databaseInitService: DatabaseInitService,
  ) {}

  @Get()
  @ApiOperation({ summary: 'Get service banner' })
  @ApiResponse({ status: 200, description: 'Service name' })
  getHello(): string {
    return this.appService.getHello();
  }

  @Get('health')
  @ApiOperation({ summary: 'Health check endpoint' })
  @ApiResponse({
    status: 200,
    description: 'Service and database status',
    schema: {
      example: {
        status: 'healthy',
        timestamp: '2026-01-01T00:00:00.000Z',
        database: 'connected',
      },
    },
  })
  async healthCheck(): Promise<HealthStatus> {
    const dbHealth = await this.databaseInitService.healthCheck();

    return {
      status: dbHealth ? 'healthy' : 'unhealthy',
      timestamp: new Date().toISOString(),
      database: dbHealth ? 'connected' : 'disconnected',
    };
  }
}

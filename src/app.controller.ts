import { Controller, Get } from '@nestjs/common';
import { Constants } from './constants';

export interface HealthResponse {
  status: 'ok';
  timestamp: string;
  service: string;
}

@Controller()
export class AppController {
  @Get('health')
  public getHealth(): HealthResponse {
    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
      service: Constants.LOGGING.APP_NAME
    };
  }
}

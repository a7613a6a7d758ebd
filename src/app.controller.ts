import { Controller, Get } from '@nestjs/common';
import { AppService } from './app.service';
import { SERVICE_NAME } from './credibility/config/credibility.constants';

@Controller()
export class AppController {
  constructor(private readonly appService: AppService) {}

  @Get()
  getRoot(): { service: string; version: string } {
    return this.appService.getInfo();
  }

  @Get('health')
  getHealth(): { status: string; service: string } {
    return {
      status: 'ok',
      service: SERVICE_NAME,
    };
  }
}

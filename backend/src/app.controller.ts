import { Controller, Get } from '@nestjs/common';
import { AppService } from './app.service.js';

@Controller()
export class AppController {
  constructor(private readonly appService: AppService) {}

  @Get()
  root() {
    return this.appService.getWelcome();
  }

  @Get('health')
  health() {
    return this.appService.getHealth();
  }
}

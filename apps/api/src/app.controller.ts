import { Controller, Get } from '@nestjs/common';

@Controller()
export class AppController {
  @Get()
  root(): { message: string } {
    return { message: 'Airline Baggage Processing System API' };
  }
}

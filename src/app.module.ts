import { Module } from '@nestjs/common';
import { APP_FILTER } from '@nestjs/core';
import { ConfigModule } from '@nestjs/config';
import { TravelAgentModule } from './travel-agent/travel-agent.module';
import { PlainTextExceptionFilter } from './travel-agent/filters/plain-text-exception.filter';

@Module({
  imports: [ConfigModule.forRoot({ isGlobal: true }), TravelAgentModule],
  providers: [{ provide: APP_FILTER, useClass: PlainTextExceptionFilter }],
})
export class AppModule {}

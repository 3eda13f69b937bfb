import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { BotModule } from './bot/bot.module';
import { validateConfig } from './config/configuration';

@Module({
  imports: [ConfigModule.forRoot({ isGlobal: true, validate: validateConfig }), BotModule],
})
export class AppModule {}

import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { AppController } from './app.controller';
import { appConfig } from './config/app.config';
import { ledgerConfig } from './config/ledger.config';
import { validateEnvironment } from './config/env.validation';
import { LedgerModule } from './ledger/ledger.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: [appConfig, ledgerConfig],
      validate: validateEnvironment,
    }),
    LedgerModule,
  ],
  controllers: [AppController],
})
export class AppModule {}

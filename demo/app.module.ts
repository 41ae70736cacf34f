import { DynamicModule, Module } from '@nestjs/common';
import { APP_GUARD } from '@nestjs/core';
import { PolicyGatewayModule } from '../lib';
import { AppConfig } from './config';
import { AccessController } from './access/access.controller';
import { PublicController } from './access/public.controller';
import { DocumentsController } from './documents/documents.controller';
import { DocumentsService } from './documents/documents.service';
import { HealthController } from './health/health.controller';
import { IDENTITY_CONFIG } from './identity/identity.config';
import { JwtIdentityGuard } from './identity/JwtIdentityGuard';

@Module({})
export class AppModule {
  static register(config: AppConfig): DynamicModule {
    return {
      module: AppModule,
      imports: [PolicyGatewayModule.forRoot(config.gateway)],
      controllers: [DocumentsController, AccessController, PublicController, HealthController],
      providers: [
        DocumentsService,
        { provide: IDENTITY_CONFIG, useValue: config.identity },
        { provide: APP_GUARD, useClass: JwtIdentityGuard },
      ],
    };
  }
}

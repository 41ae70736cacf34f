import { DynamicModule, Module } from '@nestjs/common';
import { APP_FILTER, APP_INTERCEPTOR, DiscoveryModule } from '@nestjs/core';
import { AopModule } from '@toss/nestjs-aop';
import { ClsModule } from 'nestjs-cls';
import { DEFAULT_CORRELATION_HEADER, POLICY_GATEWAY_OPTIONS } from './gateway.constants';
import { PolicyGatewayModuleOptions, PolicyGatewayModuleAsyncOptions } from './gateway.interfaces';
import { correlationClsOptions } from './correlation';
import { DecisionClient } from './decision.client';
import { DecisionMetrics } from './DecisionMetrics';
import { RequestMapper } from './RequestMapper';
import { PolicyEngineHealthProbe } from './PolicyEngineHealthProbe';
import { EnforcementInterceptor } from './EnforcementInterceptor';
import { EnforceAspect } from './EnforceAspect';
import { ErrorResponseFilter } from './ErrorResponseFilter';

const SHARED_PROVIDERS = [
  DecisionMetrics,
  DecisionClient,
  RequestMapper,
  PolicyEngineHealthProbe,
  EnforceAspect,
  { provide: APP_INTERCEPTOR, useClass: EnforcementInterceptor },
  { provide: APP_FILTER, useClass: ErrorResponseFilter },
];

const EXPORTS = [DecisionClient, DecisionMetrics, RequestMapper, PolicyEngineHealthProbe];

@Module({})
export class PolicyGatewayModule {
  static forRoot(options: PolicyGatewayModuleOptions): DynamicModule {
    return {
      module: PolicyGatewayModule,
      imports: [
        DiscoveryModule,
        AopModule,
        ClsModule.forRoot(
          correlationClsOptions(options.correlationHeader ?? DEFAULT_CORRELATION_HEADER, options.cls),
        ),
      ],
      providers: [
        { provide: POLICY_GATEWAY_OPTIONS, useValue: options },
        ...SHARED_PROVIDERS,
      ],
      exports: EXPORTS,
      global: true,
    };
  }

  static forRootAsync(asyncOptions: PolicyGatewayModuleAsyncOptions): DynamicModule {
    return {
      module: PolicyGatewayModule,
      imports: [
        DiscoveryModule,
        AopModule,
        ClsModule.forRoot(
          correlationClsOptions(asyncOptions.correlationHeader ?? DEFAULT_CORRELATION_HEADER, asyncOptions.cls),
        ),
        ...(asyncOptions.imports ?? []),
      ],
      providers: [
        {
          provide: POLICY_GATEWAY_OPTIONS,
          useFactory: asyncOptions.useFactory,
          inject: asyncOptions.inject ?? [],
        },
        ...SHARED_PROVIDERS,
      ],
      exports: EXPORTS,
      global: true,
    };
  }
}

/**
 * Example of how to configure and register the RequestAdmission module in a NestJS application
 */
import { Controller, Get, Module, Post } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import type { Request } from 'express';
import {
  AdmissionControlled,
  createAdmissionConfigFromEnv,
  RequestAdmissionModule,
  SkipAdmission,
} from '../src';

@Controller('api')
export class ApiController {
  @Get('items')
  list() {
    return [];
  }

  // Not limited, e.g. for load balancer probes
  @Get('health')
  @SkipAdmission()
  health() {
    return { ok: true };
  }
}

/**
 * Example module using static configuration: 5 requests per second with a
 * burst of 15, shared across instances through Redis, on every route
 */
@Module({
  imports: [
    RequestAdmissionModule.forRoot({
      policy: { rate: '5r/s', burst: 15 },
      storageAdapter: 'redis',
      storageOptions: {
        redis: {
          host: 'localhost',
          port: 6379,
          keyPrefix: 'api-admission:',
        },
      },
      rejectStatusCode: 429,
      applyGlobally: true,
    }),
  ],
  controllers: [ApiController],
})
export class StaticConfigAppModule {}

@Controller('uploads')
@AdmissionControlled()
export class UploadController {
  @Post()
  upload() {
    return { accepted: true };
  }
}

/**
 * Example module using async configuration from environment variables
 * (recommended for production). Only UploadController is limited here.
 */
@Module({
  imports: [
    ConfigModule.forRoot(),
    RequestAdmissionModule.forRootAsync({
      imports: [ConfigModule],
      inject: [ConfigService],
      useFactory: (configService: ConfigService) => ({
        ...createAdmissionConfigFromEnv(configService),
        // Behind a proxy that sets X-Forwarded-For, enable Express 'trust proxy'
        // so request.ip is the client; or key clients by API key instead
        clientKeyResolver: (request: Request) => request.header('x-api-key'),
      }),
    }),
  ],
  controllers: [UploadController],
})
export class AsyncConfigAppModule {}

/**
 * Example of delaying instead of rejecting: requests over the rate wait for a
 * token, at most two seconds and at most ten at a time per client
 */
@Module({
  imports: [
    RequestAdmissionModule.forRoot({
      policy: {
        rate: '30r/m',
        burst: 5,
        delayMode: true,
        maxDelayMs: 2000,
        maxQueuedPerClient: 10,
      },
      storageAdapter: 'memory',
      storageOptions: { zoneSize: '10m' },
      applyGlobally: true,
    }),
  ],
  controllers: [ApiController],
})
export class DelayModeAppModule {}

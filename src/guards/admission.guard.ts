import {
  CanActivate,
  ExecutionContext,
  HttpException,
  Inject,
  Injectable,
  Logger,
} from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import type { Request, Response } from 'express';
import { AdmissionService } from '../services/admission.service';
import { RequestAdmissionConfig } from '../interfaces/config.interface';
import { DecisionType, FinalDecision } from '../interfaces/decision.interface';
import { AdmissionAbortedError } from '../errors/admission-aborted.error';
import { SKIP_ADMISSION_KEY } from '../decorators/skip-admission.decorator';
import {
  DEFAULT_REJECT_STATUS_CODE,
  REQUEST_ADMISSION_CONFIG,
} from '../utils/constants';
import { resolveClientKey } from '../utils/client-key';

export const CLIENT_CLOSED_REQUEST_STATUS = 499;

/**
 * Guard that admits, delays or rejects HTTP requests per client.
 * A delayed request holds the guard until it is admitted or rejected.
 */
@Injectable()
export class AdmissionGuard implements CanActivate {
  private readonly logger = new Logger(AdmissionGuard.name);

  constructor(
    private readonly admissionService: AdmissionService,
    private readonly reflector: Reflector,
    @Inject(REQUEST_ADMISSION_CONFIG)
    private readonly config: RequestAdmissionConfig,
  ) {}

  async canActivate(context: ExecutionContext): Promise<boolean> {
    if (context.getType() !== 'http') {
      return true;
    }

    const skip = this.reflector.getAllAndOverride<boolean | undefined>(
      SKIP_ADMISSION_KEY,
      [context.getHandler(), context.getClass()],
    );
    if (skip) {
      return true;
    }

    const http = context.switchToHttp();
    const request = http.getRequest<Request>();
    const response = http.getResponse<Response>();
    const clientKey = resolveClientKey(request, this.config.clientKeyResolver);

    // 'close' may have fired before the request reached the guard
    if (isConnectionClosed(request, response)) {
      throw this.clientClosed(clientKey);
    }

    const controller = new AbortController();
    const onClose = () =>
      controller.abort(new AdmissionAbortedError(clientKey));
    response.once('close', onClose);

    let decision: FinalDecision;
    try {
      decision = await this.admissionService.waitForAdmission(clientKey, {
        signal: controller.signal,
      });
    } catch (error) {
      if (error instanceof AdmissionAbortedError) {
        throw this.clientClosed(clientKey);
      }
      throw error;
    } finally {
      response.off('close', onClose);
    }

    if (decision.type === DecisionType.ALLOW) {
      return true;
    }

    const statusCode =
      this.config.rejectStatusCode ?? DEFAULT_REJECT_STATUS_CODE;
    const retryAfterSeconds = Math.max(
      1,
      Math.ceil(decision.retryAfterMs / 1000),
    );

    response.setHeader('Retry-After', String(retryAfterSeconds));

    throw new HttpException(
      {
        statusCode,
        message: 'Too Many Requests',
        clientKey,
        retryAfterMs: decision.retryAfterMs,
      },
      statusCode,
    );
  }

  private clientClosed(clientKey: string): HttpException {
    this.logger.debug(`Client ${clientKey} went away before admission`);
    return new HttpException(
      {
        statusCode: CLIENT_CLOSED_REQUEST_STATUS,
        message: 'Client Closed Request',
      },
      CLIENT_CLOSED_REQUEST_STATUS,
    );
  }
}

function isConnectionClosed(request: Request, response: Response): boolean {
  return Boolean(
    request.destroyed ||
      response.writableEnded ||
      response.socket?.destroyed,
  );
}

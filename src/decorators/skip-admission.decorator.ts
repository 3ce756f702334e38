import { SetMetadata } from '@nestjs/common';

/**
 * Metadata key for routes exempt from admission control
 */
export const SKIP_ADMISSION_KEY = 'request_admission:skip';

/**
 * Exempts a controller or handler from AdmissionGuard, e.g. health checks
 * when the guard is applied globally.
 *
 * @example
 * ```typescript
 * @Controller('health')
 * export class HealthController {
 *   @Get()
 *   @SkipAdmission()
 *   check() {
 *     return { ok: true };
 *   }
 * }
 * ```
 */
export const SkipAdmission = () => SetMetadata(SKIP_ADMISSION_KEY, true);

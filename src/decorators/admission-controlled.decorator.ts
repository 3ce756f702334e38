import { applyDecorators, UseGuards } from '@nestjs/common';
import { AdmissionGuard } from '../guards/admission.guard';

/**
 * Puts a controller or handler behind AdmissionGuard.
 * Not needed when the module is registered with applyGlobally.
 *
 * @example
 * ```typescript
 * @Controller('api')
 * @AdmissionControlled()
 * export class ApiController {}
 * ```
 */
export function AdmissionControlled() {
  return applyDecorators(UseGuards(AdmissionGuard));
}

/**
 * Reason used when a delayed admission is abandoned because the client went away
 */
export class AdmissionAbortedError extends Error {
  constructor(public readonly clientKey: string) {
    super(`Admission for client ${clientKey} was abandoned`);
    this.name = 'AdmissionAbortedError';
  }
}

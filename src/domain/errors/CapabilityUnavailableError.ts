import { DomainError } from './DomainError';

/**
 * CapabilityUnavailableError
 *
 * Thrown when a Jalali operation is requested while no calendar backend
 * was configured (`AGECAL_JALALI_BACKEND=none`). Callers are expected to
 * check `JalaliConverter.isAvailable()` first; reaching this error means a
 * call site skipped that check.
 */
export class CapabilityUnavailableError extends DomainError {
  public readonly code = 'CAPABILITY_UNAVAILABLE' as const;

  public constructor(public readonly capability: string) {
    super(`Capability not available: ${capability}`);
  }
}

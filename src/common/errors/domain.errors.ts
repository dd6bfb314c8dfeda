import { NotFoundException, UnprocessableEntityException } from '@nestjs/common';

/**
 * Error taxonomy of the serving core.
 *
 * Only the first three ever reach a caller. `StaleQuote` is an exclusion reason in the
 * arbitrage scanner, `CacheMiss` a lookup status, `ShadowLogDropped` and
 * `CalibrationGateBreached` are counters and alerts.
 */
export type DomainErrorCode =
  | 'InsufficientInput'
  | 'InvalidSignal'
  | 'ModelNotFound'
  | 'StaleQuote'
  | 'CacheMiss'
  | 'ShadowLogDropped'
  | 'CalibrationGateBreached';

export class InsufficientInputError extends UnprocessableEntityException {
  readonly code: DomainErrorCode = 'InsufficientInput';

  constructor(fixtureId: string) {
    super({
      error: 'InsufficientInput',
      message: `No fixture signals available for fixture ${fixtureId}`,
    });
  }
}

export class InvalidSignalError extends UnprocessableEntityException {
  readonly code: DomainErrorCode = 'InvalidSignal';

  constructor(readonly field: string, readonly value: unknown) {
    super({
      error: 'InvalidSignal',
      message: `Signal ${field} is out of range: ${String(value)}`,
    });
  }
}

export class ModelNotFoundError extends NotFoundException {
  readonly code: DomainErrorCode = 'ModelNotFound';

  constructor(reference: string) {
    super({
      error: 'ModelNotFound',
      message: `Model ${reference} not found`,
    });
  }
}

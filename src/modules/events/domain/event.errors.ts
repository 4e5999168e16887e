import type { EventOrigins } from './event.enums';

export type NormalizationErrorContext = {
  origin: EventOrigins;
  sourceName: string;
  title?: string;
};

/**
 * Raised when a payload carries no usable identity. Redelivery of the same payload fails
 * the same way, so callers drop the item instead of retrying.
 */
export class NormalizationError extends Error {
  public readonly context: NormalizationErrorContext;

  constructor(message: string, context: NormalizationErrorContext) {
    super(message);
    this.name = 'NormalizationError';
    this.context = context;
  }
}

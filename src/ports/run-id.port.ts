/**
 * Source of run identifiers for metrics records and log correlation.
 */
export interface RunIdFactoryPort {
  next(): string;
}

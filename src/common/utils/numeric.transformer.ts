import { ValueTransformer } from 'typeorm';

/**
 * Postgres returns NUMERIC columns as strings; expose them as numbers.
 */
export class ColumnNumericTransformer implements ValueTransformer {
  to(value?: number | null): number | null | undefined {
    return value;
  }

  from(value?: string | number | null): number | null {
    if (value === null || value === undefined) {
      return null;
    }
    return typeof value === 'number' ? value : parseFloat(value);
  }
}

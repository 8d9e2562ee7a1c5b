import type { CheerioAPI } from 'cheerio';
import type { FieldScheme } from '../types';
import {
  toDurationMinutes,
  toFloat,
  toInt,
  toPercentage,
  type IntOptions,
  type PercentageOptions,
} from './coercion';
import { parseRecordFields } from './rowParser';

/**
 * Base for records built from one scheme-parsed row.
 *
 * All scheme fields are extracted at construction; subclasses expose them
 * through getters that apply the field's coercion on read.
 */
export abstract class SchemeRecord<F extends string> {
  private readonly fields: ReadonlyMap<F, string | null>;

  protected constructor(scheme: FieldScheme<F>, row: string | CheerioAPI) {
    this.fields = parseRecordFields(scheme, row);
  }

  /** Raw cell text of a field, `null` when the row has no such cell. */
  raw(field: F): string | null {
    return this.fields.get(field) ?? null;
  }

  protected int(field: F, opts?: IntOptions): number | null {
    return toInt(field, this.raw(field), opts);
  }

  protected decimal(field: F): number | null {
    return toFloat(field, this.raw(field));
  }

  protected percentage(field: F, opts?: PercentageOptions): number | null {
    return toPercentage(field, this.raw(field), opts);
  }

  protected minutes(field: F): number | null {
    return toDurationMinutes(field, this.raw(field));
  }
}

import type { DueRead } from '../codec/wire-schema.js';

/**
 * When a task is due.
 *
 * `string` is the human description and is always set. `date` (YYYY-MM-DD)
 * and `datetime` (RFC3339, UTC) are the structured forms; setting any one
 * form clears the others, and the structured setters mirror their value
 * into `string`. Formats are not checked here.
 */
export class Due {
  private _string: string;
  private _date: string | null;
  private _datetime: string | null;
  private _timezone: string | null;

  private constructor(text: string, date: string | null, datetime: string | null, timezone: string | null) {
    this._string = text;
    this._date = date;
    this._datetime = datetime;
    this._timezone = timezone;
  }

  /** A due date from free text the service will interpret, e.g. "tomorrow at noon". */
  static create(text: string): Due {
    return new Due(text, null, null, null);
  }

  /** @internal Used by the codec; extra read-model fields are already stripped. */
  static fromWire(wire: DueRead): Due {
    return new Due(wire.string, wire.date ?? null, wire.datetime ?? null, wire.timezone ?? null);
  }

  setString(text: string): void {
    this._string = text;
    this._date = null;
    this._datetime = null;
    this._timezone = null;
  }

  setDate(date: string): void {
    this._string = date;
    this._date = date;
    this._datetime = null;
    this._timezone = null;
  }

  setDatetime(datetime: string): void {
    this._string = datetime;
    this._date = null;
    this._datetime = datetime;
    this._timezone = null;
  }

  string(): string {
    return this._string;
  }

  date(): string | null {
    return this._date;
  }

  datetime(): string | null {
    return this._datetime;
  }

  /** Only known for values decoded from the service. */
  timezone(): string | null {
    return this._timezone;
  }

  clone(): Due {
    return new Due(this._string, this._date, this._datetime, this._timezone);
  }
}

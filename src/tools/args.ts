import type { JsonObject, JsonValue } from '../core/types.js';
import { ArgumentError } from '../core/errors.js';

/**
 * Typed access to already-validated tool arguments. Still checks each read,
 * since a backend can be called directly without going through the invoker.
 */
export class ToolArgs {
  constructor(
    private readonly tool: string,
    private readonly args: JsonObject
  ) {}

  value(key: string): JsonValue {
    const v = this.args[key];
    if (v === undefined) throw new ArgumentError(this.tool, `${key}: Required`);
    return v;
  }

  string(key: string): string {
    const v = this.value(key);
    if (typeof v !== 'string') throw new ArgumentError(this.tool, `${key}: Expected string`);
    return v;
  }

  optionalString(key: string): string | undefined {
    return this.args[key] === undefined ? undefined : this.string(key);
  }

  optionalNumber(key: string): number | undefined {
    const v = this.args[key];
    if (v === undefined) return undefined;
    if (typeof v !== 'number') throw new ArgumentError(this.tool, `${key}: Expected number`);
    return v;
  }

  array(key: string): JsonValue[] {
    const v = this.value(key);
    if (!Array.isArray(v)) throw new ArgumentError(this.tool, `${key}: Expected array`);
    return v;
  }

  optionalArray(key: string): JsonValue[] | undefined {
    return this.args[key] === undefined ? undefined : this.array(key);
  }
}

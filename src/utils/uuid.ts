import { v4 as uuidv4 } from 'uuid';

/** Random id for sessions, correlation of tool calls and indexed documents. */
export function uuid(): string {
  return uuidv4();
}

import type { CommandResult } from '../types/index.js';
import type { ContactsError } from '../utils/index.js';

export function ok(message: string): CommandResult {
  return { ok: true, message };
}

export function fail(error: ContactsError): CommandResult {
  return { ok: false, error };
}

export function renderResult(result: CommandResult): string {
  return result.ok ? result.message : result.error.message;
}

import { DiagnosticMessage } from '../entities/StatusSnapshot.js';

/**
 * Lenient field readers for status payloads. A missing or mistyped counter
 * reads as its default.
 */

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toFiniteNumber(value: unknown): number | undefined {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : undefined;
  }
  if (typeof value === 'string') {
    const trimmed = value.trim();
    if (trimmed === '') return undefined;
    const parsed = Number(trimmed);
    return Number.isFinite(parsed) ? parsed : undefined;
  }
  return undefined;
}

/**
 * Non-negative integer; numeric strings are parsed, fractions truncated
 */
export function safeInt(value: unknown, fallback = 0): number {
  const parsed = toFiniteNumber(value);
  if (parsed === undefined || parsed < 0) {
    return fallback;
  }
  return Math.trunc(parsed);
}

/**
 * Non-negative float; numeric strings are parsed
 */
export function safeFloat(value: unknown, fallback = 0): number {
  const parsed = toFiniteNumber(value);
  if (parsed === undefined || parsed < 0) {
    return fallback;
  }
  return parsed;
}

/**
 * Progress fraction clamped to [0, 1]
 */
export function safeFraction(value: unknown, fallback = 0): number {
  return Math.min(1, safeFloat(value, fallback));
}

export function safeBool(value: unknown, fallback = false): boolean {
  if (typeof value === 'boolean') return value;
  if (value === 1) return true;
  if (value === 0) return false;
  if (typeof value === 'string') {
    const normalized = value.trim().toLowerCase();
    if (normalized === '1' || normalized === 'true') return true;
    if (normalized === '0' || normalized === 'false') return false;
  }
  return fallback;
}

export function safeString(value: unknown): string | undefined {
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

/**
 * Messages arrive as [{ type, text }]; entries without text are dropped
 */
export function decodeMessages(value: unknown): DiagnosticMessage[] {
  if (!Array.isArray(value)) {
    return [];
  }
  const messages: DiagnosticMessage[] = [];
  for (const item of value) {
    if (!isRecord(item) || typeof item.text !== 'string') continue;
    const severity = typeof item.type === 'string' && item.type.length > 0 ? item.type.toUpperCase() : 'INFO';
    messages.push({ severity, text: item.text });
  }
  return messages;
}

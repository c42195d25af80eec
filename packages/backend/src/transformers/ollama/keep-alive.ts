/**
 * keep_alive is dynamically typed on the wire: a duration string ("5m"),
 * a number of seconds (300, 300.5, "300"), or absent. It is decoded once into a
 * closed sum type and formatted back into a duration string.
 */
export type KeepAlive =
  | { kind: 'absent' }
  | { kind: 'seconds'; seconds: number }
  | { kind: 'text'; text: string };

/** Rounds half up (300.5 -> 301), never to even. */
function roundHalfUp(value: number): number {
  return Math.floor(value + 0.5);
}

const INTEGER_PATTERN = /^[+-]?\d+$/;
const FLOAT_PATTERN = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:e[+-]?\d+)?$/i;

function toSeconds(value: number): KeepAlive {
  // NaN and the infinities have no duration form
  if (!Number.isFinite(value)) return { kind: 'absent' };
  return { kind: 'seconds', seconds: Number.isInteger(value) ? value : roundHalfUp(value) };
}

/** A bare number sent as a string counts as seconds; anything with a unit stays text. */
function parseKeepAliveText(text: string): KeepAlive {
  const trimmed = text.trim();
  if (INTEGER_PATTERN.test(trimmed)) {
    return toSeconds(Number.parseInt(trimmed, 10));
  }
  if (FLOAT_PATTERN.test(trimmed)) {
    return toSeconds(Number.parseFloat(trimmed));
  }
  return { kind: 'text', text };
}

export function parseKeepAlive(value: unknown): KeepAlive {
  if (value === null || value === undefined) {
    return { kind: 'absent' };
  }

  switch (typeof value) {
    case 'string':
      return parseKeepAliveText(value);
    case 'number':
      return toSeconds(value);
    default:
      return { kind: 'text', text: String(value) };
  }
}

export function formatKeepAlive(keepAlive: KeepAlive): string {
  switch (keepAlive.kind) {
    case 'absent':
      return '';
    case 'seconds':
      return `${keepAlive.seconds}s`;
    case 'text':
      return keepAlive.text;
  }
}

/**
 * Converts a raw keep_alive value to a duration string.
 * An empty result means "do not override".
 */
export function normalizeKeepAlive(value: unknown): string {
  return formatKeepAlive(parseKeepAlive(value));
}

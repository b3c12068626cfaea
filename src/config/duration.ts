// config/duration.ts
import { z } from 'zod';

/** Single-unit human duration → ms. Allowed: "2.5h", "45m", "1s", "250ms". */
export function parseHumanDurationToMs(input: string): number | null {
  const s = input.trim();
  const unitRe = /^(\d+(?:\.\d+)?)\s*(h|m|s|ms)$/i;
  const match = s.match(unitRe);
  if (!match) return null;

  const value = parseFloat(match[1]);
  switch (match[2].toLowerCase()) {
    case 'h':
      return Math.trunc(value * 60 * 60 * 1000);
    case 'm':
      return Math.trunc(value * 60 * 1000);
    case 's':
      return Math.trunc(value * 1000);
    case 'ms':
      return Math.trunc(value);
    default:
      return null;
  }
}

/**
 * String in, number (ms) out.
 * Rejects anything that does not parse, and anything below `minMs`.
 */
export const durationHumanToMs = (minMs = 1) =>
  z
    .string()
    .transform((val, ctx) => {
      const ms = parseHumanDurationToMs(val);
      if (ms === null) {
        ctx.addIssue({
          code: 'custom',
          message: 'Invalid duration. Use a single unit like "1h", "45m", "1s", or "500ms".',
        });
        return z.NEVER;
      }
      return ms;
    })
    .refine((ms) => ms >= minMs, { message: `Must be at least ${minMs}ms.` });

/**
 * Timestamp parsing for consolidated metadata.
 *
 * Extractors write capture times in a handful of layouts (EXIF colons,
 * ISO 8601 with or without `T`, optional fractions and offsets). Offsets are
 * dropped and the wall-clock time is read as UTC. Nothing passes through the
 * host time zone, so DST transitions never shift a capture time.
 */

import { addMilliseconds, isValid, parseISO } from "date-fns";

// yyyy:MM:dd or yyyy-MM-dd, then HH:mm:ss, optional fraction and offset
const TIMESTAMP_PATTERN =
  /^(\d{4})([:-])(\d{2})\2(\d{2})[ T](\d{2}:\d{2}:\d{2})(?:\.(\d{1,9}))?(?:Z|[+-]\d{2}:?\d{2})?$/;

export function parseTimestamp(value: string | null | undefined): Date | null {
  if (!value) {
    return null;
  }

  const match = TIMESTAMP_PATTERN.exec(value.trim());
  if (!match) {
    return null;
  }

  const [, year, , month, day, time, fraction] = match;
  const instant = parseISO(`${year}-${month}-${day}T${time}Z`);
  if (!isValid(instant)) {
    return null;
  }

  const milliseconds = fraction
    ? Number(fraction.padEnd(3, "0").slice(0, 3))
    : 0;
  return addMilliseconds(instant, milliseconds);
}

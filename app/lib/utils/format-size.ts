const UNITS = ['B', 'KiB', 'MiB', 'GiB', 'TiB', 'PiB'] as const;

/**
 * Format a byte count with binary units
 * - Below 1 KiB: whole bytes ("0 B", "512 B")
 * - Otherwise: one decimal, rounded half-up ("1.5 KiB", "2.0 GiB")
 * A value that rounds up to 1024 of a unit moves to the next unit ("1.0 MiB", not "1024.0 KiB").
 */
export function formatSize(bytes: number): string {
  if (!Number.isFinite(bytes) || bytes < 0) {
    throw new RangeError(`Invalid byte count: ${bytes}`);
  }

  const whole = Math.floor(bytes);
  if (whole < 1024) {
    return `${whole} ${UNITS[0]}`;
  }

  let unit = 1;
  let tenths = roundTenths(whole, unit);
  while (tenths >= 10240 && unit < UNITS.length - 1) {
    unit++;
    tenths = roundTenths(whole, unit);
  }

  return `${(tenths / 10).toFixed(1)} ${UNITS[unit]}`;
}

function roundTenths(bytes: number, unit: number): number {
  return Math.floor((bytes / Math.pow(1024, unit)) * 10 + 0.5);
}

/**
 * Pins the host time zone so that local date-times resolve the same way on
 * every machine.
 */
export default function globalSetup(): void {
  process.env.TZ = 'America/New_York';
}

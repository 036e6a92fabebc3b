/**
 * Roland checksum over the address and data bytes of a DT1/RQ1 message.
 * The checksum plus the sum of the covered bytes is always 0 modulo 128.
 */
export function rolandChecksum(bytes: ReadonlyArray<number>): number {
  const sum = bytes.reduce((total, value) => total + value, 0) % 128;
  return (128 - sum) % 128;
}

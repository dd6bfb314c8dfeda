import { createHash } from 'crypto';
import { Bucket } from './entities/ab-assignment.entity';

/**
 * Stable position of a device on the 1..100 rollout scale, derived from the first
 * four bytes of SHA-256(deviceId).
 */
export function bucketPosition(deviceId: string): number {
  const digest = createHash('sha256').update(deviceId, 'utf8').digest();
  return (digest.readUInt32BE(0) % 100) + 1;
}

/**
 * A device is in the canary bucket iff its position is within the percentage, so raising
 * the percentage from p1 to p2 only moves devices positioned in (p1, p2].
 */
export function bucketFor(deviceId: string, canaryPercentage: number): Bucket {
  return bucketPosition(deviceId) <= canaryPercentage ? Bucket.B : Bucket.A;
}

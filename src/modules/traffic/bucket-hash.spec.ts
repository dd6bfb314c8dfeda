import { bucketFor, bucketPosition } from './bucket-hash';
import { Bucket } from './entities/ab-assignment.entity';

describe('bucket hash', () => {
  const devices = Array.from({ length: 500 }, (_, i) => `device-${i}`);

  it('should place every device on 1..100 deterministically', () => {
    for (const device of devices) {
      const position = bucketPosition(device);

      expect(position).toBeGreaterThanOrEqual(1);
      expect(position).toBeLessThanOrEqual(100);
      expect(bucketPosition(device)).toBe(position);
    }
  });

  it('should return the same bucket for repeated calls with the same percentage', () => {
    for (const device of devices) {
      expect(bucketFor(device, 25)).toBe(bucketFor(device, 25));
    }
  });

  it('should only move devices positioned in (10, 20] when raising 10 to 20', () => {
    for (const device of devices) {
      const before = bucketFor(device, 10);
      const after = bucketFor(device, 20);
      const position = bucketPosition(device);

      if (before === Bucket.B) {
        expect(after).toBe(Bucket.B);
      }
      if (before !== after) {
        expect(position).toBeGreaterThan(10);
        expect(position).toBeLessThanOrEqual(20);
      }
    }
  });

  it('should send nobody to the canary at 0% and everybody at 100%', () => {
    expect(devices.every(d => bucketFor(d, 0) === Bucket.A)).toBe(true);
    expect(devices.every(d => bucketFor(d, 100) === Bucket.B)).toBe(true);
  });

  it('should spread devices roughly in proportion to the percentage', () => {
    const inCanary = devices.filter(d => bucketFor(d, 50) === Bucket.B).length;

    expect(inCanary).toBeGreaterThan(175);
    expect(inCanary).toBeLessThan(325);
  });
});

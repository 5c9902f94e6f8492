import { ConfigService } from '@nestjs/config';
import { ManualClock } from '../../../../test/support/manual-clock';
import { FailedAttemptRegistry } from './failed-attempt.registry';

describe('FailedAttemptRegistry', () => {
  let clock: ManualClock;

  function createRegistry(maxEntries = 100) {
    return new FailedAttemptRegistry(
      new ConfigService({ failedAttempts: { maxEntries } }),
      clock,
    );
  }

  beforeEach(() => {
    clock = new ManualClock(Date.UTC(2024, 0, 1));
  });

  it('should count consecutive failures and keep the latest details', () => {
    const registry = createRegistry();

    registry.record('alice@example.com', 'Mismatch', '10.0.0.1');
    clock.advanceSeconds(30);
    const second = registry.record('alice@example.com', 'NotFound', '10.0.0.2');

    expect(second).toEqual({
      attempts: 2,
      lastAttemptAt: new Date(Date.UTC(2024, 0, 1, 0, 0, 30)),
      lastReason: 'NotFound',
      lastOrigin: '10.0.0.2',
    });
  });

  it('should treat differently cased emails as one identifier', () => {
    const registry = createRegistry();

    registry.record('Alice@Example.com', 'Mismatch', '10.0.0.1');
    registry.record('alice@example.com', 'Mismatch', '10.0.0.1');

    expect(registry.get('ALICE@EXAMPLE.COM')?.attempts).toBe(2);
    expect(registry.size).toBe(1);
  });

  it('should clear the record and return it', () => {
    const registry = createRegistry();
    registry.record('12345678000195', 'Mismatch', '10.0.0.1');

    expect(registry.clear('12345678000195')?.attempts).toBe(1);
    expect(registry.get('12345678000195')).toBeUndefined();
    expect(registry.clear('12345678000195')).toBeUndefined();
  });

  it('should drop the entry with the oldest attempt beyond maxEntries', () => {
    const registry = createRegistry(2);
    registry.record('a@example.com', 'Mismatch', '10.0.0.1');
    registry.record('b@example.com', 'Mismatch', '10.0.0.1');
    registry.record('a@example.com', 'Mismatch', '10.0.0.1');

    registry.record('c@example.com', 'Mismatch', '10.0.0.1');

    expect(registry.size).toBe(2);
    expect(registry.get('b@example.com')).toBeUndefined();
    expect(registry.get('a@example.com')?.attempts).toBe(2);
  });

  it('should refuse a non-positive bound', () => {
    expect(() => createRegistry(0)).toThrow('Invalid failedAttempts.maxEntries: 0');
  });
});

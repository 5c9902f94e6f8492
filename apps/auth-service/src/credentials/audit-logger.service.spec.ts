import { Logger } from '@nestjs/common';
import { ManualClock } from '../../../../test/support/manual-clock';
import { AuditLogger } from './audit-logger.service';

describe('AuditLogger', () => {
  const clock = new ManualClock(Date.UTC(2024, 0, 1));
  const audit = new AuditLogger(clock);

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should write a masked failure entry at warn level', () => {
    const warn = jest.spyOn(Logger.prototype, 'warn').mockImplementation(() => undefined);

    audit.loginFailed('alice@example.com', 'Mismatch', '10.0.0.1', 3);

    expect(warn).toHaveBeenCalledTimes(1);
    expect(JSON.parse(String(warn.mock.calls[0][0]))).toEqual({
      action: 'LOGIN_FAILURE',
      ip: '10.0.0.1',
      identifier: 'a***@example.com',
      reason: 'Mismatch',
      attempts: 3,
      timestamp: '2024-01-01T00:00:00.000Z',
    });
  });

  it('should mask the principal summary on success', () => {
    const log = jest.spyOn(Logger.prototype, 'log').mockImplementation(() => undefined);

    audit.loginSucceeded(
      { id: 'principal-1', email: null, taxId: '12345678000195', displayName: 'Acme' },
      '10.0.0.1',
    );

    expect(JSON.parse(String(log.mock.calls[0][0]))).toEqual({
      action: 'LOGIN_SUCCESS',
      ip: '10.0.0.1',
      principalId: 'principal-1',
      taxId: '********0195',
      timestamp: '2024-01-01T00:00:00.000Z',
    });
  });
});

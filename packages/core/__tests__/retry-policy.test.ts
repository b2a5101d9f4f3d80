import { describe, it, expect } from 'vitest';
import {
  CommandTimeoutError,
  ConfigurationError,
  HandshakeError,
  KeyGenerationError,
  PreconditionRaceError,
  PublishError,
  TunnelError,
  classifyCycleFailure,
  classifyHandshakeFailure,
  handshakeBackoffSeconds,
} from '../src/index.js';

describe('retry classification', () => {
  it('should restart the cycle on precondition races and handshake failures', () => {
    expect(classifyCycleFailure(new PreconditionRaceError('412'))).toBe('retryable');
    expect(classifyCycleFailure(new HandshakeError('refused'))).toBe('retryable');
  });

  it('should treat everything else as fatal', () => {
    expect(classifyCycleFailure(new PublishError('403'))).toBe('fatal');
    expect(classifyCycleFailure(new KeyGenerationError('no entropy'))).toBe('fatal');
    expect(classifyCycleFailure(new ConfigurationError('bad zone'))).toBe('fatal');
    expect(classifyCycleFailure(new TunnelError('gcloud missing'))).toBe('fatal');
    expect(classifyCycleFailure(new CommandTimeoutError('uptime', 10))).toBe('fatal');
    expect(classifyCycleFailure(new Error('boom'))).toBe('fatal');
    expect(classifyCycleFailure('boom')).toBe('fatal');
  });

  it('should only repeat the connect for handshake failures', () => {
    expect(classifyHandshakeFailure(new HandshakeError('timeout'))).toBe('retryable');
    expect(classifyHandshakeFailure(new PreconditionRaceError('412'))).toBe('fatal');
  });
});

describe('handshakeBackoffSeconds', () => {
  it('should wait n seconds after failed attempt n', () => {
    expect([0, 1, 2, 3, 4].map(handshakeBackoffSeconds)).toEqual([0, 1, 2, 3, 4]);
  });

  it('should stop after the sixth attempt', () => {
    expect(handshakeBackoffSeconds(5)).toBeNull();
    expect(handshakeBackoffSeconds(6)).toBeNull();
  });
});

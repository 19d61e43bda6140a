import { describe, it, expect } from 'vitest';
import { VersionNegotiator, majorMinor } from '../../src/negotiation/VersionNegotiator.js';
import { A2AError } from '../../src/errors/A2AError.js';

describe('majorMinor', () => {
  it('drops a patch component', () => {
    expect(majorMinor('0.3.0')).toBe('0.3');
    expect(majorMinor('1.0')).toBe('1.0');
  });

  it('rejects anything else', () => {
    expect(majorMinor('v1')).toBeUndefined();
    expect(majorMinor('1')).toBeUndefined();
  });
});

describe('VersionNegotiator', () => {
  it('uses the preferred version when the caller declares none', () => {
    const negotiator = new VersionNegotiator('0.3.0');
    expect(negotiator.negotiate()).toBe('0.3');
    expect(negotiator.negotiate('')).toBe('0.3');
  });

  it('accepts a supported version', () => {
    const negotiator = new VersionNegotiator('1.0', ['0.3', '1.0']);
    expect(negotiator.negotiate('0.3')).toBe('0.3');
    expect(negotiator.supportedVersions).toEqual(['0.3', '1.0']);
  });

  it('rejects an unsupported version without falling back', () => {
    const negotiator = new VersionNegotiator('1.0', ['0.3', '1.0']);
    try {
      negotiator.negotiate('0.2');
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(A2AError);
      if (err instanceof A2AError) {
        expect(err.reason).toBe('VERSION_NOT_SUPPORTED');
        expect(err.data).toEqual({ requested: '0.2', supported: ['0.3', '1.0'] });
      }
    }
  });

  it('rejects a declared version with a patch component', () => {
    const negotiator = new VersionNegotiator('1.0');
    expect(() => negotiator.negotiate('1.0.0')).toThrow('Protocol version 1.0.0 is not supported');
  });

  it('refuses an invalid configuration', () => {
    expect(() => new VersionNegotiator('latest')).toThrow('Invalid protocolVersion: latest');
    expect(() => new VersionNegotiator('1.0', ['one'])).toThrow('Invalid supported version: one');
  });
});

import { describe, it, expect } from 'vitest';
import { ExtensionNegotiator, parseExtensionHeader } from '../../src/negotiation/ExtensionNegotiator.js';
import { A2AError } from '../../src/errors/A2AError.js';

const TRACING = 'https://ext.example.com/tracing/v1';
const BILLING = 'https://ext.example.com/billing/v1';

describe('ExtensionNegotiator', () => {
  const negotiator = new ExtensionNegotiator([
    { uri: TRACING },
    { uri: BILLING, required: true },
  ]);

  it('activates declared extensions the agent supports, in caller order', () => {
    expect(negotiator.negotiate([BILLING, 'https://ext.example.com/unknown', TRACING])).toEqual([BILLING, TRACING]);
  });

  it('does not activate another version of an extension', () => {
    expect(negotiator.negotiate([BILLING, 'https://ext.example.com/tracing/v2'])).toEqual([BILLING]);
  });

  it('requires every required extension', () => {
    try {
      negotiator.negotiate([TRACING]);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(A2AError);
      if (err instanceof A2AError) {
        expect(err.reason).toBe('EXTENSION_SUPPORT_REQUIRED');
        expect(err.data).toEqual({ extensions: [BILLING] });
      }
    }
  });

  it('lists required extensions', () => {
    expect(negotiator.required).toEqual([BILLING]);
  });

  it('activates nothing for an agent without extensions', () => {
    expect(new ExtensionNegotiator().negotiate([TRACING])).toEqual([]);
  });
});

describe('parseExtensionHeader', () => {
  it('splits and trims a comma-separated header', () => {
    expect(parseExtensionHeader(` ${TRACING} ,, ${BILLING}`)).toEqual([TRACING, BILLING]);
  });

  it('joins repeated headers', () => {
    expect(parseExtensionHeader([TRACING, BILLING])).toEqual([TRACING, BILLING]);
  });

  it('returns nothing for a missing header', () => {
    expect(parseExtensionHeader(undefined)).toEqual([]);
  });
});

jest.mock('../../src/utils/logger', () => ({
  logger: {
    info: jest.fn(),
    debug: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  },
  errorMessage: (error: unknown) => (error instanceof Error ? error.message : String(error)),
}));

import crypto from 'crypto';
import { computeSignature, isValidSignature } from '../../src/middleware/signature.validator';

describe('Meta signature', () => {
  const body = Buffer.from('{"object":"instagram","entry":[]}');
  const expected = `sha256=${crypto.createHmac('sha256', 'test-secret').update(body).digest('hex')}`;

  it('should sign the body with the app secret', () => {
    expect(computeSignature('test-secret', body)).toBe(expected);
  });

  it('should accept a matching signature', () => {
    expect(isValidSignature('test-secret', body, expected)).toBe(true);
  });

  it('should reject a signature made with another secret', () => {
    expect(isValidSignature('test-secret', body, computeSignature('other-secret', body))).toBe(false);
  });

  it('should reject a truncated signature', () => {
    expect(isValidSignature('test-secret', body, expected.slice(0, 20))).toBe(false);
  });
});

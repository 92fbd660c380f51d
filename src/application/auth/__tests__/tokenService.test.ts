import { describe, it, expect, afterEach, vi } from 'vitest';
import jwt from 'jsonwebtoken';
import { TokenService } from '../tokenService.js';
import { ExpiredTokenError, InvalidTokenError, TokenSigningError } from '../../../domain/auth/errors.js';
import { TEST_TOKEN_SETTINGS, manualClock } from '../../../test/fakes.js';

function encodeSegment(value: object): string {
  return Buffer.from(JSON.stringify(value)).toString('base64url');
}

function decodeSegment(segment: string): Record<string, unknown> {
  return JSON.parse(Buffer.from(segment, 'base64url').toString('utf8'));
}

describe('TokenService', () => {
  describe('createToken', () => {
    it('should embed subject, issue time and expiry', () => {
      const clock = manualClock();
      const tokens = new TokenService(TEST_TOKEN_SETTINGS, clock.now);

      const token = tokens.createToken({ subject: 'ann@x.com' });
      const [header, payload] = token.split('.');

      expect(decodeSegment(header)).toEqual({ alg: 'HS256', typ: 'JWT' });
      const issuedAt = Date.UTC(2026, 0, 1) / 1000;
      expect(decodeSegment(payload)).toEqual({
        sub: 'ann@x.com',
        iat: issuedAt,
        exp: issuedAt + 30 * 60,
      });
    });

    it('should honour an explicit ttl', () => {
      const clock = manualClock();
      const tokens = new TokenService(TEST_TOKEN_SETTINGS, clock.now);

      const result = tokens.validateToken(tokens.createToken({ subject: 'ann@x.com' }, 360));

      expect(result.ok).toBe(true);
      if (result.ok) {
        expect(result.value.expiresAt.toISOString()).toBe('2026-01-01T06:00:00.000Z');
      }
    });

    it('should refuse a non-positive ttl or an empty subject', () => {
      const tokens = new TokenService(TEST_TOKEN_SETTINGS);

      expect(() => tokens.createToken({ subject: 'ann@x.com' }, 0)).toThrow(TypeError);
      expect(() => tokens.createToken({ subject: 'ann@x.com' }, -5)).toThrow(TypeError);
      expect(() => tokens.createToken({ subject: '' })).toThrow(TypeError);
    });

    describe('when signing fails', () => {
      afterEach(() => {
        vi.restoreAllMocks();
      });

      it('should wrap the library error in TokenSigningError', () => {
        const failure = new Error('secretOrPrivateKey must have a value');
        vi.spyOn(jwt, 'sign').mockImplementation(() => {
          throw failure;
        });
        const tokens = new TokenService(TEST_TOKEN_SETTINGS);

        let caught: unknown;
        try {
          tokens.createToken({ subject: 'ann@x.com' });
        } catch (error) {
          caught = error;
        }

        expect(caught).toBeInstanceOf(TokenSigningError);
        expect(caught instanceof Error && caught.cause).toBe(failure);
      });
    });

    it('should refuse a ttl that rounds down to zero seconds', () => {
      const tokens = new TokenService(TEST_TOKEN_SETTINGS);

      expect(() => tokens.createToken({ subject: 'ann@x.com' }, 0.005)).toThrow(TypeError);
    });

    it('should accept a one-second ttl right after issuance', () => {
      const clock = manualClock();
      const tokens = new TokenService(TEST_TOKEN_SETTINGS, clock.now);

      const result = tokens.validateToken(tokens.createToken({ subject: 'ann@x.com' }, 1 / 60));

      expect(result.ok).toBe(true);
      if (result.ok) {
        expect(result.value.expiresAt.toISOString()).toBe('2026-01-01T00:00:01.000Z');
      }
    });
  });

  describe('validateToken', () => {
    it('should accept a token right after issuance', () => {
      const clock = manualClock();
      const tokens = new TokenService(TEST_TOKEN_SETTINGS, clock.now);

      const result = tokens.validateToken(tokens.createToken({ subject: 'ann@x.com' }));

      expect(result).toEqual({
        ok: true,
        value: {
          subject: 'ann@x.com',
          issuedAt: new Date('2026-01-01T00:00:00.000Z'),
          expiresAt: new Date('2026-01-01T00:30:00.000Z'),
        },
      });
    });

    it('should accept a token one second before expiry', () => {
      const clock = manualClock();
      const tokens = new TokenService(TEST_TOKEN_SETTINGS, clock.now);
      const token = tokens.createToken({ subject: 'ann@x.com' });

      clock.advanceSeconds(30 * 60 - 1);

      expect(tokens.validateToken(token).ok).toBe(true);
    });

    it('should report ExpiredTokenError once the ttl has elapsed', () => {
      const clock = manualClock();
      const tokens = new TokenService(TEST_TOKEN_SETTINGS, clock.now);
      const token = tokens.createToken({ subject: 'ann@x.com' });

      clock.advanceMinutes(30);
      const result = tokens.validateToken(token);

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toBeInstanceOf(ExpiredTokenError);
        expect(result.error).not.toBeInstanceOf(InvalidTokenError);
      }
    });

    it('should report InvalidTokenError when the payload is altered', () => {
      const clock = manualClock();
      const tokens = new TokenService(TEST_TOKEN_SETTINGS, clock.now);
      const [header, payload, signature] = tokens
        .createToken({ subject: 'ann@x.com' })
        .split('.');

      const forged = encodeSegment({ ...decodeSegment(payload), sub: 'bob@x.com' });
      const result = tokens.validateToken([header, forged, signature].join('.'));

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toBeInstanceOf(InvalidTokenError);
      }
    });

    it('should report InvalidTokenError when the expiry is pushed out', () => {
      const clock = manualClock();
      const tokens = new TokenService(TEST_TOKEN_SETTINGS, clock.now);
      const [header, payload, signature] = tokens
        .createToken({ subject: 'ann@x.com' })
        .split('.');

      const claims = decodeSegment(payload);
      const forged = encodeSegment({ ...claims, exp: Number(claims.exp) + 3600 });

      expect(tokens.validateToken([header, forged, signature].join('.')).ok).toBe(false);
    });

    it('should report InvalidTokenError when the signature is altered', () => {
      const clock = manualClock();
      const tokens = new TokenService(TEST_TOKEN_SETTINGS, clock.now);
      const [header, payload, signature] = tokens
        .createToken({ subject: 'ann@x.com' })
        .split('.');

      const flipped = (signature[0] === 'A' ? 'B' : 'A') + signature.slice(1);
      const result = tokens.validateToken([header, payload, flipped].join('.'));

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toBeInstanceOf(InvalidTokenError);
      }
    });

    it('should report InvalidTokenError for a token signed with another secret', () => {
      const clock = manualClock();
      const issuer = new TokenService({ ...TEST_TOKEN_SETTINGS, secret: 'another-secret-value' }, clock.now);
      const tokens = new TokenService(TEST_TOKEN_SETTINGS, clock.now);

      const result = tokens.validateToken(issuer.createToken({ subject: 'ann@x.com' }));

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toBeInstanceOf(InvalidTokenError);
      }
    });

    it('should only accept the configured algorithm', () => {
      const clock = manualClock();
      const issuer = new TokenService({ ...TEST_TOKEN_SETTINGS, algorithm: 'HS512' }, clock.now);
      const tokens = new TokenService(TEST_TOKEN_SETTINGS, clock.now);

      const result = tokens.validateToken(issuer.createToken({ subject: 'ann@x.com' }));

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toBeInstanceOf(InvalidTokenError);
      }
    });

    it('should reject an unsigned token', () => {
      const tokens = new TokenService(TEST_TOKEN_SETTINGS);
      const exp = Math.floor(Date.now() / 1000) + 600;
      const unsigned = `${encodeSegment({ alg: 'none', typ: 'JWT' })}.${encodeSegment({ sub: 'ann@x.com', exp })}.`;

      const result = tokens.validateToken(unsigned);

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toBeInstanceOf(InvalidTokenError);
      }
    });

    it('should reject a correctly signed token without expiry', () => {
      const tokens = new TokenService(TEST_TOKEN_SETTINGS);
      const token = jwt.sign({ sub: 'ann@x.com' }, TEST_TOKEN_SETTINGS.secret, {
        algorithm: 'HS256',
      });

      const result = tokens.validateToken(token);

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toBeInstanceOf(InvalidTokenError);
        expect(result.error.message).toBe('Token has no expiry');
      }
    });

    it.each(['', 'garbage', 'a.b.c', 'Bearer x'])('should reject malformed input %j', (input) => {
      const tokens = new TokenService(TEST_TOKEN_SETTINGS);

      const result = tokens.validateToken(input);

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toBeInstanceOf(InvalidTokenError);
      }
    });
  });
});

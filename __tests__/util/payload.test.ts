import { describe, it, expect } from 'vitest';
import { isMessagePayload, parsePayload, payloadHash, serializePayload } from '../../src/util/payload.js';
import { ValidationError } from '../../src/errors/index.js';

describe('payload', () => {
  describe('isMessagePayload', () => {
    it('should accept a headers and record envelope', () => {
      expect(isMessagePayload({ headers: ['Id'], record: { Id: '1' } })).toBe(true);
      expect(isMessagePayload({ headers: [], record: {} })).toBe(true);
    });

    it('should reject non-string values and missing parts', () => {
      expect(isMessagePayload({ headers: ['Id'], record: { Id: 1 } })).toBe(false);
      expect(isMessagePayload({ headers: [1], record: {} })).toBe(false);
      expect(isMessagePayload({ record: {} })).toBe(false);
      expect(isMessagePayload(null)).toBe(false);
    });
  });

  describe('parsePayload', () => {
    it('should accept decoded JSON and JSON text', () => {
      const expected = { headers: ['Id'], record: { Id: '7' } };
      expect(parsePayload(expected)).toEqual(expected);
      expect(parsePayload('{"headers":["Id"],"record":{"Id":"7"}}')).toEqual(expected);
    });

    it('should throw ValidationError for anything else', () => {
      expect(() => parsePayload({ headers: 'Id' })).toThrow(ValidationError);
    });
  });

  describe('serializePayload', () => {
    it('should order record fields by the headers, extras last', () => {
      const text = serializePayload({ headers: ['B', 'A'], record: { Extra: 'x', A: '1', B: '2' } });

      expect(text).toBe('{"headers":["B","A"],"record":{"B":"2","A":"1","Extra":"x"}}');
    });
  });

  describe('payloadHash', () => {
    it('should not depend on record insertion order', () => {
      const a = payloadHash({ headers: ['Id', 'Name'], record: { Id: '1', Name: 'Ada' } });
      const b = payloadHash({ headers: ['Id', 'Name'], record: { Name: 'Ada', Id: '1' } });

      expect(a).toBe(b);
      expect(a).toHaveLength(64);
    });

    it('should differ when a value differs', () => {
      const a = payloadHash({ headers: ['Id'], record: { Id: '1' } });
      const b = payloadHash({ headers: ['Id'], record: { Id: '2' } });

      expect(a).not.toBe(b);
    });
  });
});

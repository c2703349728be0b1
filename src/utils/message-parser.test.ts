import { describe, it, expect } from 'vitest';
import { decodeLine, encodeReadyToken, parseDeviceLine } from './message-parser';

describe('decodeLine', () => {
  it('should trim whitespace and carriage returns', () => {
    expect(decodeLine('  FWR\r')).toBe('FWR');
    expect(decodeLine('\rDistance: 12.000000')).toBe('Distance: 12.000000');
  });

  it('should drop bytes that failed to decode', () => {
    expect(decodeLine('F\uFFFDWR\uFFFD')).toBe('FWR');
  });
});

describe('parseDeviceLine', () => {
  it('should return null for an empty line', () => {
    expect(parseDeviceLine('')).toBeNull();
  });

  it('should parse distance readings', () => {
    expect(parseDeviceLine('Distance:100')).toEqual({ type: 'distance', value: 100 });
    expect(parseDeviceLine('Distance: 12.500000')).toEqual({ type: 'distance', value: 12.5 });
    expect(parseDeviceLine('Distance:-3e2')).toEqual({ type: 'distance', value: -300 });
  });

  it('should flag malformed distance payloads', () => {
    expect(parseDeviceLine('Distance:abc')).toEqual({ type: 'malformed-distance', raw: 'Distance:abc' });
    expect(parseDeviceLine('Distance:')).toEqual({ type: 'malformed-distance', raw: 'Distance:' });
    expect(parseDeviceLine('Distance:0x10')).toEqual({ type: 'malformed-distance', raw: 'Distance:0x10' });
    expect(parseDeviceLine('Distance:Infinity')).toEqual({ type: 'malformed-distance', raw: 'Distance:Infinity' });
  });

  it('should recognize step and direction tokens exactly', () => {
    expect(parseDeviceLine('FWR')).toEqual({ type: 'forward' });
    expect(parseDeviceLine('CDR')).toEqual({ type: 'change-direction' });
    expect(parseDeviceLine('FWR2')).toEqual({ type: 'unknown', raw: 'FWR2' });
    expect(parseDeviceLine('cdr')).toEqual({ type: 'unknown', raw: 'cdr' });
  });

  it('should report anything else as unknown', () => {
    expect(parseDeviceLine('ESP32: Waiting for RDY signal...')).toEqual({
      type: 'unknown',
      raw: 'ESP32: Waiting for RDY signal...',
    });
  });
});

describe('encodeReadyToken', () => {
  it('should terminate the ready token with CRLF', () => {
    expect(encodeReadyToken()).toBe('RDY\r\n');
  });
});

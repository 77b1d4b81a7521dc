import { describe, it, expect } from 'vitest';
import { checkRoundTrip } from './round-trip.js';

describe('checkRoundTrip', () => {
  it.each([
    '?1;param=123',
    '45;param1;param2="my string"',
    '45.1;param1=%"my %c3%96 string"',
    '@1744045540',
    '"a string like no other";param1;param2;param3',
    '*big/$good_token#!;param1=@1744045540',
    "Big/%good_token&'*-;param1=5540",
    'big+/good.token^`|~:;param1=5540.113',
    '%"my %c3%96 string";param1=token/string',
    ':DeviceIDDeviceIDDevicQ==:;param1=:DeviceIODeviceIODevicQ==:',
    "(:YQ==: @1744045540 Big/%good_token&'*-);param1=5540.113;param2=:DeviceIODeviceIODevicQ==:",
    '(?0;p2=?0;p3=123;p4=123.456 ?1;date=@1000 123;str="attention");p45=Big/%good_token&\'*-',
  ])('reproduces item %s', (text) => {
    expect(checkRoundTrip('item', text)).toEqual({ ok: true, serialized: text });
  });

  it.each([
    '()',
    '?0, ?1, 123, 134.321, @1744045540, "something", Big/%good_token&\'*-, %"my %c3%96 string", :YQ==:, ()',
    '(tok1);p1, ?0;p2=?0;p3=123;p4=123.456, ?1;date=@1000, 123;str="attention";p45=Big/%good_token&\'*-',
    '%"my %c3%96 string";p4=123.4;p3=123, :YQ==:;t1=token, (?0 ?1 123 134.321 @1744045540);bool1;bool2=?0',
  ])('reproduces list %s', (text) => {
    expect(checkRoundTrip('list', text)).toEqual({ ok: true, serialized: text });
  });

  it.each([
    'k1=(@1744045540 12 tok);param1, k2="my string";bool1, k3=?0, k4;tok2',
    'k1=?0, k2, k3=123, k4=134.321, k5=@1744045540, k6="something", k7=Big/%good_token&\'*-, k8=%"my %c3%96 string", k9=:YQ==:, k10=()',
    'k1=134.321;str=%"my %c3%96 string", k2=@1744045540;boolt;boolf=?0, k3="something";n=0.1, k4=Big/%good_token&\'*-;mybytes=:JQ==:',
  ])('reproduces dictionary %s', (text) => {
    expect(checkRoundTrip('dictionary', text)).toEqual({ ok: true, serialized: text });
  });

  it('reports non-canonical input with the serialized form', () => {
    expect(checkRoundTrip('list', '1,2')).toEqual({
      ok: false,
      serialized: '1, 2',
      error: 'Serialized value does not match original: 1, 2 != 1,2',
    });
  });

  it('reports an explicit true boolean as non-canonical', () => {
    const result = checkRoundTrip('dictionary', 'a=?1');
    expect(result.ok).toBe(false);
    expect(result.serialized).toBe('a');
  });

  it('reports parse errors', () => {
    const result = checkRoundTrip('item', '1;');
    expect(result.ok).toBe(false);
    expect(result.serialized).toBeUndefined();
  });
});

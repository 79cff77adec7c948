import { describe, expect, it } from 'vitest';
import { parseFormBody } from '../src/http/formBody';

const encode = (text: string) => Buffer.from(text, 'utf8');

describe('parseFormBody', () => {
  it('decodes name and size', () => {
    const body = encode('name=Chip&size=small');
    expect(parseFormBody(body, String(body.length))).toEqual({ name: 'Chip', size: 'small' });
  });

  it('decodes plus signs and percent escapes', () => {
    const body = encode('name=Red+Squirrel&size=extra%20large&note=%C3%A9t%C3%A9');
    expect(parseFormBody(body, String(body.length))).toEqual({
      name: 'Red Squirrel',
      size: 'extra large',
      note: 'été',
    });
  });

  it('keeps the first value of a repeated key', () => {
    const body = encode('name=first&name=second&size=s');
    expect(parseFormBody(body, String(body.length))).toEqual({ name: 'first', size: 's' });
  });

  it('drops pairs with an empty value', () => {
    const body = encode('name=&size=small&flag');
    expect(parseFormBody(body, String(body.length))).toEqual({ size: 'small' });
  });

  it('reads only the declared number of bytes', () => {
    const body = encode('name=Chip&size=small');
    expect(parseFormBody(body, '9')).toEqual({ name: 'Chip' });
  });

  it('accepts a numeric declared length', () => {
    const body = encode('size=tiny');
    expect(parseFormBody(body, body.length)).toEqual({ size: 'tiny' });
  });

  it('returns an empty map when the declared length is missing or malformed', () => {
    const body = encode('name=Chip&size=small');
    expect(parseFormBody(body, undefined)).toEqual({});
    expect(parseFormBody(body, 'abc')).toEqual({});
    expect(parseFormBody(body, '-4')).toEqual({});
    expect(parseFormBody(body, '1.5')).toEqual({});
    expect(parseFormBody(body, -1)).toEqual({});
  });

  it('returns an empty map without a body', () => {
    expect(parseFormBody(undefined, '10')).toEqual({});
    expect(parseFormBody(null, '10')).toEqual({});
  });

  it('returns an empty map for bytes that are not UTF-8', () => {
    const body = Buffer.from([0x6e, 0x61, 0x6d, 0x65, 0x3d, 0xff, 0xfe]);
    expect(parseFormBody(body, String(body.length))).toEqual({});
  });

  it('accepts a string body', () => {
    expect(parseFormBody('name=Nutkin&size=small', '22')).toEqual({ name: 'Nutkin', size: 'small' });
  });
});

import { generateColor, generateColorFromHash, hashString } from '../../src/domain/color';
import { formatJoinSetId, joinSetIdColor } from '../../src/domain/join-set-id';

describe('color', () => {
  test('hashes with 64-bit FNV-1a', () => {
    expect(hashString('')).toBe(0xcbf29ce484222325n);
    expect(hashString('a')).toBe(0xaf63dc4c8601ec8cn);
  });

  test('maps a hash to a light HSL color', () => {
    expect(generateColorFromHash(0n)).toBe('hsl(0, 70%, 65%)');
    expect(generateColorFromHash(365n)).toBe('hsl(5, 70%, 65%)');
  });

  test('is stable for the same input', () => {
    expect(generateColor('o:a')).toBe(generateColor('o:a'));
    expect(generateColor('o:a')).toMatch(/^hsl\(\d{1,3}, \d{2,3}%, \d{2}%\)$/);
  });

  test('formats and colors join set ids', () => {
    expect(formatJoinSetId({ kind: 'oneOff', name: 'a' })).toBe('o:a');
    expect(formatJoinSetId({ kind: 'named', name: 'batch' })).toBe('n:batch');
    expect(formatJoinSetId({ kind: 'generated', name: '3' })).toBe('g:3');
    expect(joinSetIdColor({ kind: 'named', name: 'batch' })).toBe(generateColor('n:batch'));
  });
});

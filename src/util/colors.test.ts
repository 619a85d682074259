import { describe, it, expect } from 'vitest';
import { RGB } from './colors';


describe('RGB', () => {

    it('splits a 24-bit integer into channels', () => {
        const color = new RGB(0xFF8001);

        expect(color.toTuple()).toEqual([ 255, 128, 1 ]);
        expect(color.rgb24).toBe(0xFF8001);
    });

    it('formats as a hex color string', () => {
        expect(new RGB(255, 0, 255).toString()).toBe('#ff00ff');
        expect(new RGB(0, 0, 1).toString()).toBe('#000001');
    });

    it('compares channels exactly', () => {
        const color = RGB.fromTuple([ 10, 20, 30 ]);

        expect(color.equals(new RGB(10, 20, 30))).toBe(true);
        expect(color.equals(new RGB(10, 20, 31))).toBe(false);
        expect(color.matches(10, 20, 30)).toBe(true);
        expect(color.matches(11, 20, 30)).toBe(false);
    });

    it('rejects channels outside of a byte', () => {
        expect(() => new RGB(256, 0, 0)).toThrow(RangeError);
        expect(() => new RGB(0, -1, 0)).toThrow(RangeError);
        expect(() => RGB.fromTuple([ 0, 0, 1.5 ])).toThrow(RangeError);
    });

});

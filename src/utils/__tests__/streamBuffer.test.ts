import { describe, it, expect, beforeEach } from 'vitest';
import { StreamLineBuffer } from '../streamBuffer';

describe('StreamLineBuffer', () => {
    let buffer: StreamLineBuffer;

    beforeEach(() => {
        buffer = new StreamLineBuffer();
    });

    it('should handle complete lines in a single chunk', () => {
        expect(buffer.process('line1\nline2\n')).toEqual(['line1', 'line2']);
        expect(buffer.flush()).toEqual([]);
    });

    it('should handle split chunks', () => {
        expect(buffer.process('li')).toEqual([]);
        expect(buffer.process('ne1\n')).toEqual(['line1']);
    });

    it('should keep a partial last line until flushed', () => {
        expect(buffer.process('line1\nline2\npartial')).toEqual(['line1', 'line2']);
        expect(buffer.flush()).toEqual(['partial']);
        expect(buffer.flush()).toEqual([]);
    });

    it('should reassemble a JSON fragment split across chunks', () => {
        expect(buffer.process('{"text":"hello","start":0,')).toEqual([]);
        expect(buffer.process('"end":1}\n')).toEqual(['{"text":"hello","start":0,"end":1}']);
    });

    it('should keep empty lines between newlines', () => {
        expect(buffer.process('line1\n\nline2\n')).toEqual(['line1', '', 'line2']);
    });

    it('should drop carriage returns of CRLF output', () => {
        expect(buffer.process('line1\r\nline2\r\nlast\r')).toEqual(['line1', 'line2']);
        expect(buffer.flush()).toEqual(['last']);
    });

    it('should not flush whitespace-only leftovers', () => {
        buffer.process('done\n  ');
        expect(buffer.flush()).toEqual([]);
    });
});

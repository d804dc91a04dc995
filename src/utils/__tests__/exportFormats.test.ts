import { describe, it, expect } from 'vitest';
import { exportChunks, formatLineTimestamp, formatSrtTime, getFileExtension, parseFormat, toSRT, toTXT } from '../exportFormats';
import { SubtitleChunk } from '../../types/transcript';

describe('exportFormats', () => {
    const chunks: SubtitleChunk[] = [
        { text: 'Hello world', start: 0.0, end: 2.5 },
        { text: 'Second line', start: 2.5, end: 5.0 },
    ];

    it('should format to SRT correctly', () => {
        const expected = `1
00:00:00,000 --> 00:00:02,500
Hello world

2
00:00:02,500 --> 00:00:05,000
Second line
`;
        expect(toSRT(chunks)).toBe(expected);
    });

    it('should end SRT with one newline and no blank line', () => {
        expect(toSRT(chunks).slice(-12)).toBe('Second line\n');
        expect(toSRT(chunks).endsWith('\n\n')).toBe(false);
        expect(toSRT([{ text: 'Only', start: 0, end: 1 }])).toBe('1\n00:00:00,000 --> 00:00:01,000\nOnly\n');
    });

    it('should produce identical output when formatting twice', () => {
        expect(toSRT(chunks)).toBe(toSRT(chunks));
        expect(toTXT(chunks, 'readable')).toBe(toTXT(chunks, 'readable'));
    });

    it('should format to plain text without timestamps', () => {
        expect(toTXT(chunks)).toBe('Hello world\nSecond line');
    });

    it('should prefix readable timestamps', () => {
        expect(toTXT(chunks, 'readable')).toBe('[00:00] Hello world\n[00:02] Second line');
    });

    it('should include hours in readable timestamps from one hour on', () => {
        expect(toTXT([{ text: 'Late', start: 3725.9, end: 3727 }], 'readable')).toBe('[01:02:05] Late');
    });

    it('should prefix seconds timestamps with one decimal', () => {
        expect(toTXT(chunks, 'seconds')).toBe('[0.0s] Hello world\n[2.5s] Second line');
    });

    it('should return empty strings for no chunks', () => {
        expect(toSRT([])).toBe('');
        expect(toTXT([])).toBe('');
    });

    it('should dispatch on the requested format', () => {
        expect(exportChunks(chunks, { format: 'srt' })).toBe(toSRT(chunks));
        expect(exportChunks(chunks, { format: 'txt', timestamps: 'seconds' })).toBe(toTXT(chunks, 'seconds'));
        expect(exportChunks(chunks, { format: 'txt' })).toBe('Hello world\nSecond line');
    });

    it('should map formats to extensions', () => {
        expect(getFileExtension('srt')).toBe('.srt');
        expect(getFileExtension('txt')).toBe('.txt');
    });

    it('should parse format names case-insensitively', () => {
        expect(parseFormat('SRT')).toBe('srt');
        expect(parseFormat(' txt ')).toBe('txt');
        expect(parseFormat('vtt')).toBeNull();
    });
});

describe('formatSrtTime', () => {
    it('pads every field', () => {
        expect(formatSrtTime(0)).toBe('00:00:00,000');
        expect(formatSrtTime(0.001)).toBe('00:00:00,001');
        expect(formatSrtTime(59.999)).toBe('00:00:59,999');
    });

    it('decomposes hours, minutes, seconds and milliseconds', () => {
        expect(formatSrtTime(3661.5)).toBe('01:01:01,500');
    });

    it('does not wrap hours at 24', () => {
        expect(formatSrtTime(90000)).toBe('25:00:00,000');
    });

    it('carries rounded milliseconds into the seconds field', () => {
        expect(formatSrtTime(2.9996)).toBe('00:00:03,000');
    });
});

describe('formatLineTimestamp', () => {
    it('renders nothing for the none style', () => {
        expect(formatLineTimestamp(12.3, 'none')).toBe('');
    });

    it('drops milliseconds in the readable style', () => {
        expect(formatLineTimestamp(83.9, 'readable')).toBe('[01:23]');
    });

    it('renders seconds with one decimal', () => {
        expect(formatLineTimestamp(83.5, 'seconds')).toBe('[83.5s]');
    });
});

/**
 * Splits a chunked text stream (child process stdout/stderr) into lines.
 * Handles lines split across chunks and several lines per chunk; a trailing
 * `\r` is dropped so CRLF output reads the same as LF output.
 */
export class StreamLineBuffer {
    private buffer: string = '';

    /**
     * Appends a chunk and returns complete lines.
     * The last incomplete line is kept in the buffer.
     *
     * @param chunk - The incoming string chunk.
     * @return Complete lines found so far, without line terminators.
     */
    process(chunk: string): string[] {
        this.buffer += chunk;
        if (this.buffer.indexOf('\n') === -1) {
            return [];
        }

        const lines = this.buffer.split('\n');
        this.buffer = lines.pop() ?? '';

        return lines.map(stripCarriageReturn);
    }

    /**
     * Returns any remaining buffer content as the last line.
     * Useful when the stream ends.
     *
     * @return Array containing the remaining line if any, or empty array.
     */
    flush(): string[] {
        const line = stripCarriageReturn(this.buffer);
        this.buffer = '';
        return line.trim().length > 0 ? [line] : [];
    }
}

function stripCarriageReturn(line: string): string {
    return line.endsWith('\r') ? line.slice(0, -1) : line;
}

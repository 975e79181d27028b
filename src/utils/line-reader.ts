import { createReadStream, type ReadStream } from 'fs';
import { createGunzip, type Gunzip } from 'zlib';

export function isGzipped(filePath: string): boolean {
    return filePath.endsWith('.gz');
}

/**
 * Yields every line of a text file (gzip-decoded when the name ends in
 * `.gz`), without the trailing newline or carriage return. Blank lines are
 * yielded too so callers can report accurate line numbers.
 */
export async function* readLines(filePath: string): AsyncGenerator<string> {
    const input = createReadStream(filePath);
    let stream: ReadStream | Gunzip = input;

    if (isGzipped(filePath)) {
        const gunzip = createGunzip();
        input.on('error', (error) => gunzip.destroy(error));
        stream = input.pipe(gunzip);
    }

    stream.setEncoding('utf8');
    let lineBuffer = '';

    try {
        for await (const chunk of stream) {
            lineBuffer += String(chunk);
            const lines = lineBuffer.split('\n');

            // Keep the last partial line in the buffer
            lineBuffer = lines.pop() ?? '';

            for (const line of lines) {
                yield line.endsWith('\r') ? line.slice(0, -1) : line;
            }
        }

        if (lineBuffer) {
            yield lineBuffer.endsWith('\r') ? lineBuffer.slice(0, -1) : lineBuffer;
        }
    } finally {
        input.destroy();
    }
}

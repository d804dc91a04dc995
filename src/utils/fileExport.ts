import { rename, unlink, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { v4 as uuidv4 } from 'uuid';
import { ExportOptions, SubtitleChunk, TranscriptFormat } from '../types/transcript';
import { hasErrorCode } from './errorHandling';
import { exportChunks, getFileExtension } from './exportFormats';

/**
 * Computes where a source file's transcript goes: same directory and base
 * name, with the extension of the format.
 *
 * @param sourcePath The audio file path.
 * @param format The output format.
 */
export function resolveOutputPath(sourcePath: string, format: TranscriptFormat): string {
    const { dir, name } = path.parse(sourcePath);
    return path.join(dir, `${name}${getFileExtension(format)}`);
}

/**
 * Writes UTF-8 text so that readers never observe a partial file: the content
 * goes to a temporary sibling which is then renamed over the target.
 *
 * @param filePath The target path.
 * @param content The text to write.
 * @throws {Error} If writing or renaming fails; the temporary file is removed.
 */
export async function writeTextFileAtomic(filePath: string, content: string): Promise<void> {
    const tempPath = path.join(path.dirname(filePath), `.${path.basename(filePath)}.${uuidv4()}.tmp`);

    try {
        await writeFile(tempPath, content, 'utf8');
        await rename(tempPath, filePath);
    } catch (error) {
        try {
            await unlink(tempPath);
        } catch (cleanupError) {
            if (!hasErrorCode(cleanupError, 'ENOENT')) console.warn('[FileExport] Failed to remove temp file:', tempPath, cleanupError);
        }
        throw error;
    }
}

/**
 * Renders the chunks and writes them to the given path.
 *
 * @param chunks The chunks to export.
 * @param filePath The output path.
 * @param options The format options.
 */
export async function saveTranscript(chunks: readonly SubtitleChunk[], filePath: string, options: ExportOptions): Promise<void> {
    const content = exportChunks(chunks, options);
    await writeTextFileAtomic(filePath, content);
    console.log(`[FileExport] Wrote ${chunks.length} chunks to ${filePath}`);
}

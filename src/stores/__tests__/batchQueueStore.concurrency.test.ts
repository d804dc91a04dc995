import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { ModelService } from '../../services/modelService';
import { TranscriptionService } from '../../services/transcriptionService';
import { FakeEngine } from '../../services/__tests__/fakeEngine';
import { resolveOutputPath } from '../../utils/fileExport';
import { createBatchQueueStore, whenIdle } from '../batchQueueStore';

const tick = () => new Promise<void>((resolve) => setTimeout(resolve, 1));

describe('batchQueueStore concurrency', () => {
    beforeEach(() => {
        vi.spyOn(console, 'log').mockImplementation(() => {});
        vi.spyOn(console, 'warn').mockImplementation(() => {});
        vi.spyOn(console, 'error').mockImplementation(() => {});
    });

    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('never runs two items at once, even when files arrive mid-run', async () => {
        let active = 0;
        let maxActive = 0;
        const order: string[] = [];
        const store = createBatchQueueStore({
            processItem: async (item) => {
                active += 1;
                maxActive = Math.max(maxActive, active);
                order.push(item.filename);
                await tick();
                active -= 1;
                return {};
            },
        });

        store.getState().addFiles(['/a/1.mp3', '/a/2.mp3']);
        store.getState().addFiles(['/a/3.mp3']);
        await tick();
        store.getState().addFiles(['/a/4.mp3']);
        store.getState().processQueue();
        await whenIdle(store);

        expect(maxActive).toBe(1);
        expect(order).toEqual(['1.mp3', '2.mp3', '3.mp3', '4.mp3']);
        expect(store.getState().getCounts().completed).toBe(4);
    });

    it('checks the one-processing invariant on every state change', async () => {
        const store = createBatchQueueStore({
            processItem: async () => {
                await tick();
                return {};
            },
        });
        const violations: number[] = [];
        store.subscribe((state) => {
            const processing = state.queueItems.filter((item) => item.status.state === 'processing').length;
            if (processing > 1) violations.push(processing);
        });

        store.getState().addFiles(['/a/1.mp3', '/a/2.mp3', '/a/3.mp3']);
        await whenIdle(store);

        expect(violations).toEqual([]);
    });

    describe('with the transcription pipeline', () => {
        let dir: string;

        beforeEach(async () => {
            dir = await mkdtemp(path.join(tmpdir(), 'transcriber-queue-'));
        });

        afterEach(async () => {
            await rm(dir, { recursive: true, force: true });
        });

        it('fails a silent file and still transcribes the next one', async () => {
            const silent = path.join(dir, 'silent.mp3');
            const speech = path.join(dir, 'speech.mp3');
            await writeFile(silent, 'x');
            await writeFile(speech, 'x');

            const engine = new FakeEngine({
                fragments: {
                    [silent]: [{ text: '   ', start: 0, end: 1 }],
                    '*': [{ text: 'Good morning.', start: 0, end: 1.5 }],
                },
            });
            const service = new TranscriptionService(engine, new ModelService(engine));
            const store = createBatchQueueStore({
                processItem: async (item, onProgress) => {
                    const summary = await service.transcribeFile(
                        {
                            inputPath: item.filePath,
                            outputPath: resolveOutputPath(item.filePath, 'srt'),
                            format: 'srt',
                            locale: 'en-US',
                        },
                        { onProgress }
                    );
                    return { outputPath: summary.outputPath };
                },
            });

            store.getState().addFiles([silent, speech]);
            await whenIdle(store);

            const [first, second] = store.getState().queueItems;
            expect(first.status).toEqual({
                state: 'failed',
                reason: `No transcription produced for ${silent}. The speech model may not be properly installed.`,
            });
            expect(second.status).toEqual({ state: 'completed' });
            expect(second.outputPath).toBe(path.join(dir, 'speech.srt'));
            expect(await readFile(path.join(dir, 'speech.srt'), 'utf8')).toBe('1\n00:00:00,000 --> 00:00:01,500\nGood morning.\n');
        });
    });
});

import { describe, it, expect, afterEach } from 'vitest';
import i18n from '../../i18n';
import { BatchQueueItemStatus } from '../../types/batchQueue';
import { canTransition, describeStatus, isTerminal } from '../queueStatus';

const pending: BatchQueueItemStatus = { state: 'pending' };
const processing: BatchQueueItemStatus = { state: 'processing' };
const completed: BatchQueueItemStatus = { state: 'completed' };
const failed: BatchQueueItemStatus = { state: 'failed', reason: 'Audio file not found: /a.mp3' };

describe('queueStatus', () => {
    afterEach(async () => {
        await i18n.changeLanguage('en');
    });

    it('allows only the forward transitions', () => {
        expect(canTransition(pending, processing)).toBe(true);
        expect(canTransition(processing, completed)).toBe(true);
        expect(canTransition(processing, failed)).toBe(true);

        expect(canTransition(pending, completed)).toBe(false);
        expect(canTransition(pending, failed)).toBe(false);
        expect(canTransition(processing, pending)).toBe(false);
        expect(canTransition(completed, processing)).toBe(false);
        expect(canTransition(failed, pending)).toBe(false);
        expect(canTransition(completed, failed)).toBe(false);
    });

    it('treats completed and failed as terminal', () => {
        expect(isTerminal(pending)).toBe(false);
        expect(isTerminal(processing)).toBe(false);
        expect(isTerminal(completed)).toBe(true);
        expect(isTerminal(failed)).toBe(true);
    });

    it('describes statuses in English', () => {
        expect(describeStatus(pending)).toBe('Waiting...');
        expect(describeStatus(processing)).toBe('Transcribing...');
        expect(describeStatus(completed)).toBe('Completed');
        expect(describeStatus(failed)).toBe('Failed: Audio file not found: /a.mp3');
    });

    it('describes statuses in Chinese', async () => {
        await i18n.changeLanguage('zh');

        expect(describeStatus(pending)).toBe('等待中...');
        expect(describeStatus(failed)).toBe('失败：Audio file not found: /a.mp3');
    });
});

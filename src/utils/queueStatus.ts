import i18n from '../i18n';
import { BatchQueueItemState, BatchQueueItemStatus } from '../types/batchQueue';

const TRANSITIONS: Record<BatchQueueItemState, readonly BatchQueueItemState[]> = {
    pending: ['processing'],
    processing: ['completed', 'failed'],
    completed: [],
    failed: [],
};

/**
 * Whether a queue item may move from one status to another.
 */
export function canTransition(from: BatchQueueItemStatus, to: BatchQueueItemStatus): boolean {
    return TRANSITIONS[from.state].includes(to.state);
}

/**
 * Whether no transition leaves this status.
 */
export function isTerminal(status: BatchQueueItemStatus): boolean {
    return TRANSITIONS[status.state].length === 0;
}

/**
 * Localized description of a status, e.g. `Failed: Audio file not found: /a.mp3`.
 */
export function describeStatus(status: BatchQueueItemStatus): string {
    switch (status.state) {
        case 'pending':
            return i18n.t('status.pending');
        case 'processing':
            return i18n.t('status.processing');
        case 'completed':
            return i18n.t('status.completed');
        case 'failed':
            return i18n.t('status.failed', { reason: status.reason });
    }
}

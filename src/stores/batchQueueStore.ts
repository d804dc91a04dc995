import path from 'node:path';
import { v4 as uuidv4 } from 'uuid';
import { StoreApi, createStore } from 'zustand/vanilla';
import { BatchQueueCounts, BatchQueueItem, BatchQueueItemStatus } from '../types/batchQueue';
import { isFatalError, toErrorMessage } from '../utils/errorHandling';
import { canTransition, describeStatus, isTerminal } from '../utils/queueStatus';

/**
 * Does the work for one queue item.
 * Resolves with the written output path, rejects with the failure reason.
 */
export type ProcessItem = (item: BatchQueueItem, onProgress: (ratio: number) => void) => Promise<{ outputPath?: string }>;

export interface BatchQueueOptions {
    /** Work function run for each item, one item at a time. */
    processItem: ProcessItem;
    /** Called after every accepted status change. */
    onStatusChange?: (item: BatchQueueItem) => void;
}

/** State interface for the batch queue store. */
export interface BatchQueueState {
    /** List of queued files, in insertion order. */
    queueItems: BatchQueueItem[];
    /** ID of the item being processed, if any. At most one item is processing. */
    processingItemId: string | null;
    /** Whether the queue is currently working through items. */
    isQueueProcessing: boolean;
    /** Set when an error made further processing pointless; the queue stops. */
    haltReason: string | null;

    /**
     * Adds files to the queue as pending items and starts processing if idle.
     *
     * @param filePaths Array of file paths to add.
     * @return IDs of the new items.
     */
    addFiles: (filePaths: string[]) => string[];

    /**
     * Starts the next pending item unless one is already processing.
     */
    processQueue: () => void;

    /**
     * Moves an item to a new status if the transition is legal.
     *
     * @param id Item ID.
     * @param status New status.
     * @return Whether the change was applied.
     */
    updateItemStatus: (id: string, status: BatchQueueItemStatus) => boolean;

    /**
     * Records progress of the processing item. Progress never goes down.
     *
     * @param id Item ID.
     * @param ratio Progress in [0, 1].
     */
    updateItemProgress: (id: string, ratio: number) => void;

    /**
     * Removes a pending item from the queue.
     *
     * @param id Item ID to remove.
     * @return Whether an item was removed.
     */
    removeItem: (id: string) => boolean;

    /** Drops completed and failed items. */
    clearFinished: () => void;

    /** Counts items per status. */
    getCounts: () => BatchQueueCounts;

    /** internal helper */
    _processItem: (itemId: string) => Promise<void>;
}

export type BatchQueueStore = StoreApi<BatchQueueState>;

/**
 * Creates a batch queue store.
 *
 * Items are processed strictly one at a time in insertion order. A failed item
 * never stops the queue, except when the error says that no item could ever
 * succeed (the engine is missing), in which case the queue halts.
 */
export function createBatchQueueStore(options: BatchQueueOptions): BatchQueueStore {
    return createStore<BatchQueueState>((set, get) => ({
        queueItems: [],
        processingItemId: null,
        isQueueProcessing: false,
        haltReason: null,

        addFiles: (filePaths) => {
            const now = Date.now();
            const newItems: BatchQueueItem[] = filePaths.map((filePath) => ({
                id: uuidv4(),
                filename: path.basename(filePath) || filePath,
                filePath,
                status: { state: 'pending' },
                progress: 0,
                createdAt: now,
            }));

            set((state) => ({
                queueItems: [...state.queueItems, ...newItems],
            }));

            // Auto-start processing if not already running
            get().processQueue();

            return newItems.map((item) => item.id);
        },

        processQueue: () => {
            const state = get();

            if (state.processingItemId !== null || state.haltReason !== null) {
                return;
            }

            const nextItem = state.queueItems.find((item) => item.status.state === 'pending');
            if (!nextItem) {
                if (state.isQueueProcessing) {
                    console.log('[BatchQueue] Queue idle');
                    set({ isQueueProcessing: false });
                }
                return;
            }

            // Claim the slot before anything can yield.
            set({ processingItemId: nextItem.id, isQueueProcessing: true });
            get().updateItemStatus(nextItem.id, { state: 'processing' });

            void get()._processItem(nextItem.id);
        },

        _processItem: async (itemId) => {
            const item = get().queueItems.find((i) => i.id === itemId);

            try {
                if (!item) {
                    throw new Error(`Queue item ${itemId} disappeared`);
                }

                console.log(`[BatchQueue] Processing ${item.filename}`);
                const result = await options.processItem(item, (ratio) => {
                    get().updateItemProgress(itemId, ratio);
                });

                set((state) => ({
                    queueItems: state.queueItems.map((i) =>
                        i.id === itemId ? { ...i, progress: 1, outputPath: result.outputPath } : i
                    ),
                }));
                get().updateItemStatus(itemId, { state: 'completed' });
            } catch (error) {
                const reason = toErrorMessage(error);
                console.error(`[BatchQueue] Failed to transcribe ${item?.filename ?? itemId}:`, reason);
                get().updateItemStatus(itemId, { state: 'failed', reason });

                if (isFatalError(error)) {
                    console.error('[BatchQueue] Halting queue:', reason);
                    set({ haltReason: reason, isQueueProcessing: false });
                }
            } finally {
                set({ processingItemId: null });
                // Trigger next item in queue
                get().processQueue();
            }
        },

        updateItemStatus: (id, status) => {
            const item = get().queueItems.find((i) => i.id === id);
            if (!item) {
                console.warn(`[BatchQueue] Ignoring status change for unknown item ${id}`);
                return false;
            }
            if (!canTransition(item.status, status)) {
                console.warn(`[BatchQueue] Ignoring illegal transition ${item.status.state} -> ${status.state} for ${item.filename}`);
                return false;
            }

            const updated: BatchQueueItem = { ...item, status };
            set((state) => ({
                queueItems: state.queueItems.map((i) => (i.id === id ? updated : i)),
            }));
            console.log(`[BatchQueue] ${item.filename}: ${describeStatus(status)}`);
            options.onStatusChange?.(updated);
            return true;
        },

        updateItemProgress: (id, ratio) => {
            if (!Number.isFinite(ratio)) return;
            const clamped = Math.min(Math.max(ratio, 0), 1);
            set((state) => ({
                queueItems: state.queueItems.map((item) =>
                    item.id === id && item.status.state === 'processing' && clamped > item.progress
                        ? { ...item, progress: clamped }
                        : item
                ),
            }));
        },

        removeItem: (id) => {
            const item = get().queueItems.find((i) => i.id === id);
            if (!item || item.status.state !== 'pending') {
                return false;
            }
            set((state) => ({
                queueItems: state.queueItems.filter((i) => i.id !== id),
            }));
            return true;
        },

        clearFinished: () => {
            set((state) => ({
                queueItems: state.queueItems.filter((item) => !isTerminal(item.status)),
            }));
        },

        getCounts: () => {
            const counts: BatchQueueCounts = { pending: 0, processing: 0, completed: 0, failed: 0 };
            for (const item of get().queueItems) {
                counts[item.status.state] += 1;
            }
            return counts;
        },
    }));
}

/**
 * Whether the queue has nothing left to do (or has halted).
 */
export function isQueueIdle(state: BatchQueueState): boolean {
    if (state.haltReason !== null) return true;
    return state.processingItemId === null && !state.queueItems.some((item) => item.status.state === 'pending');
}

/**
 * Resolves once the queue is idle.
 */
export function whenIdle(store: BatchQueueStore): Promise<void> {
    return new Promise((resolve) => {
        if (isQueueIdle(store.getState())) {
            resolve();
            return;
        }
        const unsubscribe = store.subscribe((state) => {
            if (isQueueIdle(state)) {
                unsubscribe();
                resolve();
            }
        });
    });
}

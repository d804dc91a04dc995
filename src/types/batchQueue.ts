/**
 * Status of a batch queue item.
 *
 * `pending` is initial; `completed` and `failed` are terminal.
 */
export type BatchQueueItemStatus =
    | { state: 'pending' }
    | { state: 'processing' }
    | { state: 'completed' }
    | { state: 'failed'; reason: string };

export type BatchQueueItemState = BatchQueueItemStatus['state'];

/**
 * Represents a file in the batch transcription queue.
 */
export interface BatchQueueItem {
    /** Unique identifier for the queue item. Never reused. */
    id: string;
    /** Original filename (display name). */
    filename: string;
    /** Full file path for processing. */
    filePath: string;
    /** Current processing status. */
    status: BatchQueueItemStatus;
    /** Processing progress (0-1). */
    progress: number;
    /** Where the transcript was written, once completed. */
    outputPath?: string;
    /** Creation time (epoch ms). */
    createdAt: number;
}

/** Per-state item counts. */
export type BatchQueueCounts = Record<BatchQueueItemState, number>;

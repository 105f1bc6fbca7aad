export type OggFatalErrorCode =
    | 'ALLOCATION_FAILED'
    | 'BUFFER_OVERFLOW'
    | 'INVALID_OPTION'
    | 'SOURCE_CLOSED';

/**
 * Unrecoverable decoder failure.
 *
 * Only buffer allocation, API misuse and bad configuration end up here.
 * Corrupt pages and broken streams are reported as status values and
 * {@link StreamIssue} records instead, so decoding can carry on.
 *
 * @example
 * ```ts
 * try {
 *   const packets = loadOgg(data, { chunkSize: 0 });
 * } catch (error) {
 *   if (error instanceof OggFatalError && error.code === 'INVALID_OPTION') {
 *     // fix the options
 *   }
 * }
 * ```
 */
export class OggFatalError extends Error {
    constructor(readonly code: OggFatalErrorCode, message: string) {
        super(`[ogg-demuxer] ${message}`);
        this.name = 'OggFatalError';
        Object.setPrototypeOf(this, OggFatalError.prototype);
    }
}

export type StreamIssue =
    | { kind: 'sequence-gap'; serial: number; expected: number; received: number }
    | { kind: 'page-after-eos'; serial: number; sequenceNumber: number }
    /** Continued page arrived with nothing pending; its leading fragment was dropped */
    | { kind: 'missing-continuation'; serial: number; droppedBytes: number }
    /** Fresh page arrived while a packet was still pending; the pending bytes were dropped */
    | { kind: 'discarded-fragment'; serial: number; droppedBytes: number }
    /** Input ended while a packet was still pending */
    | { kind: 'truncated-packet'; serial: number; droppedBytes: number };

export type StreamIssueKind = StreamIssue['kind'];

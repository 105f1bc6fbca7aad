import { OggPacket, OggPage } from "./oggTypes";
import { StreamIssue } from "../common/errors";
import debug from "../common/debugger";

const debugLog = (...args: unknown[]) => debug.debugLog('demuxer', ...args);

export type StreamState = 'idle' | 'accumulating' | 'terminated';

/**
 * Reassembles the packets of one logical stream from its pages.
 *
 * Lacing values below 255 close a packet; a 255 means the packet goes on in
 * the next segment, possibly on the next page. Damage is never fatal: a lost
 * fragment drops that packet only, and is recorded in {@link issues}.
 */
export class OggStreamDemuxer {
    readonly issues: StreamIssue[] = [];

    private pending: Uint8Array[] = [];
    private pendingSize = 0;
    private expectedSequence: number | undefined;
    private packetCount = 0;
    private sawBos = false;
    private _state: StreamState = 'idle';

    constructor(readonly serialNumber: number) {}

    get state(): StreamState {
        return this._state;
    }

    get terminated(): boolean {
        return this._state === 'terminated';
    }

    get pendingBytes(): number {
        return this.pendingSize;
    }

    get expectedPageSequence(): number | undefined {
        return this.expectedSequence;
    }

    /**
     * Feed the next page of this stream.
     * @returns packets completed by this page, in order
     */
    pageIn(page: OggPage): OggPacket[] {
        if (page.serialNumber !== this.serialNumber) {
            throw new Error(`Page for serial ${page.serialNumber} routed to stream ${this.serialNumber}`);
        }

        if (this._state === 'terminated') {
            this.report({ kind: 'page-after-eos', serial: this.serialNumber, sequenceNumber: page.pageSequence });
            return [];
        }

        if (this.expectedSequence === undefined) {
            this.sawBos = page.bos;
        } else if (page.pageSequence !== this.expectedSequence) {
            this.report({
                kind: 'sequence-gap',
                serial: this.serialNumber,
                expected: this.expectedSequence,
                received: page.pageSequence,
            });
            if (this._state === 'accumulating') {
                // The rest of the pending packet was on the lost page
                this.report({ kind: 'discarded-fragment', serial: this.serialNumber, droppedBytes: this.pendingSize });
                this.resetPending();
            }
        }
        this.expectedSequence = (page.pageSequence + 1) >>> 0;

        const table = page.segmentTable;
        let segment = 0;
        let bodyOffset = 0;

        if (!page.continued && this._state === 'accumulating') {
            this.report({ kind: 'discarded-fragment', serial: this.serialNumber, droppedBytes: this.pendingSize });
            this.resetPending();
        } else if (page.continued && this._state === 'idle' && table.length > 0) {
            // Head of a packet we never saw: skip to the end of it
            while (segment < table.length) {
                const lacing = table[segment++];
                bodyOffset += lacing;
                if (lacing < 255) break;
            }
            this.report({ kind: 'missing-continuation', serial: this.serialNumber, droppedBytes: bodyOffset });

            if (segment === table.length && table[table.length - 1] === 255) {
                // The orphan runs on past this page too
                return this.finishPage(page, []);
            }
        }

        const completed: Uint8Array[] = [];
        let packetStart = bodyOffset;

        for (; segment < table.length; segment++) {
            const lacing = table[segment];
            bodyOffset += lacing;

            if (lacing === 255) continue;

            const tail = page.payload.subarray(packetStart, bodyOffset);
            completed.push(this.takePacket(tail));
            packetStart = bodyOffset;
        }

        if (packetStart < bodyOffset) {
            this.appendPending(page.payload.slice(packetStart, bodyOffset));
        }

        return this.finishPage(page, completed);
    }

    /**
     * Drop whatever is still pending; called once input is exhausted.
     * @returns number of bytes dropped
     */
    flush(): number {
        const dropped = this.pendingSize;
        if (this._state === 'accumulating') {
            this.report({ kind: 'truncated-packet', serial: this.serialNumber, droppedBytes: dropped });
            this.resetPending();
        }
        return dropped;
    }

    private finishPage(page: OggPage, completed: Uint8Array[]): OggPacket[] {
        const packets = completed.map((data, index): OggPacket => ({
            serialNumber: this.serialNumber,
            data,
            isFirstInStream: this.sawBos && this.packetCount + index === 0,
            isLastInStream: false,
            granulePosition: index === completed.length - 1 ? page.granulePosition : BigInt(-1),
            packetNumber: this.packetCount + index,
        }));
        this.packetCount += packets.length;

        const table = page.segmentTable;
        const closesLastPacket = table.length === 0
            ? this._state === 'idle'
            : table[table.length - 1] < 255;

        if (page.eos && closesLastPacket) {
            if (packets.length > 0) {
                packets[packets.length - 1].isLastInStream = true;
            }
            this._state = 'terminated';
            debugLog(`Stream ${this.serialNumber} ended after ${this.packetCount} packets`);
        }

        return packets;
    }

    private takePacket(tail: Uint8Array): Uint8Array {
        if (this._state !== 'accumulating') return tail;

        const data = new Uint8Array(this.pendingSize + tail.length);
        let offset = 0;
        for (const fragment of this.pending) {
            data.set(fragment, offset);
            offset += fragment.length;
        }
        data.set(tail, offset);
        this.resetPending();
        return data;
    }

    private appendPending(fragment: Uint8Array): void {
        this.pending.push(fragment);
        this.pendingSize += fragment.length;
        this._state = 'accumulating';
    }

    private resetPending(): void {
        this.pending = [];
        this.pendingSize = 0;
        this._state = 'idle';
    }

    private report(issue: StreamIssue): void {
        this.issues.push(issue);
        debugLog(`Stream ${issue.serial}: ${issue.kind}`, issue);
    }
}

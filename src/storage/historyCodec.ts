/**
 * Binary layout of the history file (big-endian):
 *
 *   "PFH1" | u32 count | count × ( u16 idLength | id (utf-8) | u8 bitrate )
 *
 * Records are written in key order.
 */

import { BitrateVariant, HistoryRecord } from '../download/core/types';
import { HistoryCorruptionError } from '../download/core/errors';
import { compareBitrates } from '../download/quality/BitrateSelector';

const MAGIC = Buffer.from('PFH1', 'ascii');
const MAX_ID_BYTES = 0xffff;

const BITRATE_CODES: Record<BitrateVariant, number> = {
    [BitrateVariant.LOW]: 1,
    [BitrateVariant.MID]: 2,
    [BitrateVariant.HIGH]: 3,
};

const CODE_BITRATES = new Map<number, BitrateVariant>([
    [1, BitrateVariant.LOW],
    [2, BitrateVariant.MID],
    [3, BitrateVariant.HIGH],
]);

const NUMERIC_ID = /^\d+$/;

/**
 * Numeric ids by value (no precision loss), numeric before non-numeric,
 * everything else lexically.
 */
export function compareTrackIds(a: string, b: string): number {
    const aNumeric = NUMERIC_ID.test(a);
    const bNumeric = NUMERIC_ID.test(b);

    if (aNumeric && bNumeric) {
        const aDigits = a.replace(/^0+(?=\d)/, '');
        const bDigits = b.replace(/^0+(?=\d)/, '');
        if (aDigits.length !== bDigits.length) {
            return aDigits.length - bDigits.length;
        }
        if (aDigits !== bDigits) {
            return aDigits < bDigits ? -1 : 1;
        }
    } else if (aNumeric !== bNumeric) {
        return aNumeric ? -1 : 1;
    }

    if (a === b) return 0;
    return a < b ? -1 : 1;
}

export function compareHistoryRecords(a: HistoryRecord, b: HistoryRecord): number {
    return compareTrackIds(a.trackId, b.trackId) || compareBitrates(a.bitrate, b.bitrate);
}

export function encodeHistory(records: Iterable<HistoryRecord>): Buffer {
    const chunks: Buffer[] = [];
    let count = 0;

    for (const record of records) {
        const id = Buffer.from(record.trackId, 'utf-8');
        if (id.length > MAX_ID_BYTES) {
            throw new RangeError(`Track id too long to store: ${record.trackId.substring(0, 32)}…`);
        }
        const entry = Buffer.alloc(2 + id.length + 1);
        entry.writeUInt16BE(id.length, 0);
        id.copy(entry, 2);
        entry.writeUInt8(BITRATE_CODES[record.bitrate], 2 + id.length);
        chunks.push(entry);
        count++;
    }

    const header = Buffer.alloc(MAGIC.length + 4);
    MAGIC.copy(header, 0);
    header.writeUInt32BE(count, MAGIC.length);

    return Buffer.concat([header, ...chunks]);
}

export function decodeHistory(data: Buffer): HistoryRecord[] {
    if (data.length < MAGIC.length + 4 || !data.subarray(0, MAGIC.length).equals(MAGIC)) {
        throw new HistoryCorruptionError('History file has an unknown format');
    }

    const count = data.readUInt32BE(MAGIC.length);
    const records: HistoryRecord[] = [];
    let offset = MAGIC.length + 4;

    for (let i = 0; i < count; i++) {
        if (offset + 2 > data.length) {
            throw new HistoryCorruptionError(`History file truncated at record ${i}`);
        }
        const idLength = data.readUInt16BE(offset);
        offset += 2;

        if (offset + idLength + 1 > data.length) {
            throw new HistoryCorruptionError(`History file truncated at record ${i}`);
        }
        const trackId = data.toString('utf-8', offset, offset + idLength);
        offset += idLength;

        const code = data.readUInt8(offset);
        offset += 1;

        const bitrate = CODE_BITRATES.get(code);
        if (!bitrate) {
            throw new HistoryCorruptionError(`Unknown bitrate code ${code} at record ${i}`);
        }
        records.push({ trackId, bitrate });
    }

    if (offset !== data.length) {
        throw new HistoryCorruptionError('History file has trailing data');
    }

    return records;
}

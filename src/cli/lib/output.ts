import type { ChunkRecord } from '../../document';

/**
 * ChunkRecord with the image bytes replaced by their size, for printing.
 */
export type PrintableRecord = Omit<ChunkRecord, 'image'> & {
  image?: { mimeType: string; bytes: number };
};

export function toPrintableRecords(records: readonly ChunkRecord[]): PrintableRecord[] {
  return records.map(({ image, ...rest }) => {
    const printable: PrintableRecord = { ...rest };
    if (image) {
      printable.image = { mimeType: image.mimeType, bytes: image.data.length };
    }
    return printable;
  });
}

const PREVIEW_LENGTH = 60;

/**
 * One line per record: index, kind, first line of content.
 */
export function summarizeRecords(records: readonly ChunkRecord[]): string[] {
  return records.map((record, index) => {
    const firstLine = record.content.split('\n').find((line) => line.trim()) ?? '';
    const preview = firstLine.length > PREVIEW_LENGTH ? `${firstLine.slice(0, PREVIEW_LENGTH)}…` : firstLine;
    return `${String(index + 1).padStart(4)} ${record.kind.padEnd(5)} ${preview}`;
  });
}

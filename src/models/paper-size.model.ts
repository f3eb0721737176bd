export interface PaperSize {
  readonly id: string;
  readonly name: string;
  readonly widthMm: number;
  readonly heightMm: number;
}

/** Paper sizes accepted in job settings and capability snapshots */
export const PAPER_SIZES: readonly PaperSize[] = [
  { id: 'A5', name: 'A5', widthMm: 148, heightMm: 210 },
  { id: 'B5', name: 'B5 (JIS)', widthMm: 182, heightMm: 257 },
  { id: 'A4', name: 'A4', widthMm: 210, heightMm: 297 },
  { id: 'LETTER', name: 'Letter', widthMm: 216, heightMm: 279 },
  { id: 'LEGAL', name: 'Legal', widthMm: 216, heightMm: 356 },
  { id: 'B4', name: 'B4 (JIS)', widthMm: 257, heightMm: 364 },
  { id: 'TABLOID', name: 'Tabloid', widthMm: 279, heightMm: 432 },
  { id: 'A3', name: 'A3', widthMm: 297, heightMm: 420 },
  { id: 'SRA3', name: 'SRA3 (A3+)', widthMm: 320, heightMm: 450 },
] as const;

export const PAPER_SIZE_IDS = ['A5', 'B5', 'A4', 'LETTER', 'LEGAL', 'B4', 'TABLOID', 'A3', 'SRA3'] as const;

export type PaperSizeId = (typeof PAPER_SIZE_IDS)[number];

export function getPaperSize(id: string): PaperSize | undefined {
  const key = id.toUpperCase();
  return PAPER_SIZES.find((s) => s.id === key);
}

/** True when a sheet of `requested` fits on a device whose largest sheet is `max` (either orientation). */
export function paperFits(requested: string, max: string): boolean {
  const req = getPaperSize(requested);
  const cap = getPaperSize(max);
  if (!req || !cap) return false;
  const [reqShort, reqLong] = [Math.min(req.widthMm, req.heightMm), Math.max(req.widthMm, req.heightMm)];
  const [capShort, capLong] = [Math.min(cap.widthMm, cap.heightMm), Math.max(cap.widthMm, cap.heightMm)];
  return reqShort <= capShort && reqLong <= capLong;
}

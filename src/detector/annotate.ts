import type { Detection } from "../types.js";

const PALETTE = ["#e6194b", "#3cb44b", "#ffe119", "#4363d8", "#f58231", "#911eb4", "#42d4f4", "#f032e6", "#bfef45", "#fabed4"];

const WRITABLE_FORMATS = ["jpeg", "png", "webp", "gif", "tiff", "avif"] as const;

export type WritableFormat = (typeof WRITABLE_FORMATS)[number];

const isWritableFormat = (format: string): format is WritableFormat =>
  (WRITABLE_FORMATS as readonly string[]).includes(format);

/** Re-encode in the input's format where sharp can write it, JPEG otherwise. */
export const resolveOutputFormat = (format: string | undefined): WritableFormat =>
  format && isWritableFormat(format) ? format : "jpeg";

const escapeXml = (value: string): string =>
  value
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&apos;");

/**
 * SVG overlay the size of the image: one outlined box and caption per detection.
 */
export function renderAnnotationSvg(
  detections: readonly Detection[],
  width: number,
  height: number,
  labelFor: (classId: number) => string,
): string {
  const stroke = Math.max(2, Math.round(Math.min(width, height) / 200));
  const fontSize = Math.max(12, Math.round(Math.min(width, height) / 30));

  const shapes = detections.map((detection) => {
    const [x1, y1, x2, y2] = detection.bbox;
    const color = PALETTE[detection.classId % PALETTE.length];
    const caption = escapeXml(`${labelFor(detection.classId)} ${detection.confidence.toFixed(2)}`);
    const textY = y1 > fontSize + 4 ? y1 - 4 : y1 + fontSize + 2;
    return [
      `<rect x="${x1}" y="${y1}" width="${Math.max(0, x2 - x1)}" height="${Math.max(0, y2 - y1)}" fill="none" stroke="${color}" stroke-width="${stroke}"/>`,
      `<text x="${x1 + 2}" y="${textY}" font-family="sans-serif" font-size="${fontSize}" fill="${color}">${caption}</text>`,
    ].join("");
  });

  return `<svg xmlns="http://www.w3.org/2000/svg" width="${width}" height="${height}">${shapes.join("")}</svg>`;
}

import sharp from 'sharp';
import type { Detection } from '../types';

export const DEFECT_CLASSES = new Set(['bad_insulator', 'damaged_insulator']);

const DEFECT_COLOR = 'rgb(239,68,68)';
const NORMAL_COLOR = 'rgb(34,197,94)';

export function isDefectClass(cls: string): boolean {
  return DEFECT_CLASSES.has(cls);
}

export function escapeXml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}

export function detectionLabel(d: Pick<Detection, 'class' | 'class_ru' | 'confidence'>): string {
  return `${d.class_ru || d.class} ${Math.round(d.confidence * 100)}%`;
}

function clamp(v: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, v));
}

/** SVG-слой с рамками и подписями поверх изображения width×height. */
export function buildOverlaySvg(width: number, height: number, detections: Detection[]): string {
  const stroke = Math.max(2, Math.round(Math.min(width, height) / 300));
  const fontSize = Math.max(12, Math.round(Math.min(width, height) / 45));
  const pad = Math.round(fontSize / 3);

  const shapes = detections.map((d) => {
    const [rx1, ry1, rx2, ry2] = d.bbox;
    const x1 = clamp(Math.min(rx1, rx2), 0, width);
    const y1 = clamp(Math.min(ry1, ry2), 0, height);
    const x2 = clamp(Math.max(rx1, rx2), 0, width);
    const y2 = clamp(Math.max(ry1, ry2), 0, height);
    const color = isDefectClass(d.class) ? DEFECT_COLOR : NORMAL_COLOR;

    const label = detectionLabel(d);
    const labelW = Math.round(label.length * fontSize * 0.6) + pad * 2;
    const labelH = fontSize + pad * 2;
    // подпись над рамкой, если влезает, иначе внутри у верхнего края
    const labelY = y1 - labelH >= 0 ? y1 - labelH : y1;
    const labelX = clamp(x1, 0, Math.max(0, width - labelW));

    return [
      `<rect x="${x1}" y="${y1}" width="${x2 - x1}" height="${y2 - y1}" fill="none" stroke="${color}" stroke-width="${stroke}"/>`,
      `<rect x="${labelX}" y="${labelY}" width="${labelW}" height="${labelH}" fill="${color}"/>`,
      `<text x="${labelX + pad}" y="${labelY + pad + fontSize * 0.85}" font-family="DejaVu Sans, Arial, sans-serif" font-size="${fontSize}" fill="#fff">${escapeXml(label)}</text>`,
    ].join('');
  });

  return `<svg xmlns="http://www.w3.org/2000/svg" width="${width}" height="${height}">${shapes.join('')}</svg>`;
}

export interface Renderer {
  render(image: Buffer, detections: Detection[]): Promise<Buffer>;
}

export class AnnotationRenderer implements Renderer {
  constructor(private quality = 85) {}

  async render(image: Buffer, detections: Detection[]): Promise<Buffer> {
    const { width, height } = await sharp(image).metadata();
    if (!width || !height) throw new Error('Не удалось определить размер изображения');

    const pipeline = sharp(image);
    if (detections.length > 0) {
      const overlay = Buffer.from(buildOverlaySvg(width, height, detections));
      pipeline.composite([{ input: overlay, top: 0, left: 0 }]);
    }
    return pipeline.jpeg({ quality: this.quality }).toBuffer();
  }
}

// src/services/renderCapabilities.ts
// Startup probe of the rendering engines. Requests read the result, they never probe.

import sharp from 'sharp';
import PDFDocument from 'pdfkit';
import { errMessage } from './errors';

export interface RenderCapabilities {
  charts: boolean;
  pdf: boolean;
  details: {
    sharp: string;
    pdfkit: string;
  };
}

const PROBE_SVG = '<svg xmlns="http://www.w3.org/2000/svg" width="4" height="4"><rect width="4" height="4" fill="#fff"/></svg>';

async function probeCharts(): Promise<string | null> {
  const { svg, png } = sharp.format;
  if (!svg.input.buffer) return 'sharp was built without SVG input support';
  if (!png.output.buffer) return 'sharp was built without PNG output support';

  const out = await sharp(Buffer.from(PROBE_SVG)).png().toBuffer();
  return out.length > 0 ? null : 'sharp produced an empty PNG';
}

function probePdf(): Promise<string | null> {
  return new Promise((resolve, reject) => {
    const doc = new PDFDocument({ size: [72, 72] });
    let bytes = 0;
    doc.on('data', (chunk: Buffer) => {
      bytes += chunk.length;
    });
    doc.on('end', () => resolve(bytes > 0 ? null : 'pdfkit produced an empty document'));
    doc.on('error', reject);
    doc.end();
  });
}

async function check(name: string, probe: () => Promise<string | null>): Promise<[boolean, string]> {
  try {
    const problem = await probe();
    if (problem) {
      console.warn(`[Capabilities] ${name} unavailable: ${problem}`);
      return [false, problem];
    }
    return [true, 'ok'];
  } catch (err) {
    console.error(`[Capabilities] ${name} probe failed:`, errMessage(err));
    return [false, errMessage(err)];
  }
}

/**
 * Run once at startup; the result is passed into the report service.
 */
export async function detectRenderCapabilities(): Promise<RenderCapabilities> {
  const [[charts, sharpDetail], [pdf, pdfDetail]] = await Promise.all([
    check('Chart rendering (sharp)', probeCharts),
    check('PDF rendering (pdfkit)', probePdf),
  ]);

  console.log(`[Capabilities] charts=${charts} pdf=${pdf}`);
  return { charts, pdf, details: { sharp: sharpDetail, pdfkit: pdfDetail } };
}

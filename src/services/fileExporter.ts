// src/services/fileExporter.ts
// Persists rendered artifacts under a deterministic per-identity name

import { promises as fs } from 'fs';
import * as path from 'path';
import { v4 as uuid } from 'uuid';
import { ArtifactKind, ArtifactReference } from '../types/intake';
import { ExportFailure, ValidationError, errMessage } from './errors';

export const ARTIFACT_EXTENSIONS: Record<ArtifactKind, 'png' | 'pdf'> = {
  intake_chart: 'png',
  intake_report: 'pdf',
  growth_chart: 'png',
};

export const ARTIFACT_CONTENT_TYPES: Record<ArtifactKind, string> = {
  intake_chart: 'image/png',
  intake_report: 'application/pdf',
  growth_chart: 'image/png',
};

export interface FileExporterOptions {
  rootDir: string;
  baseUrl: string;
  publicPath: string;
}

/**
 * Injective, filesystem-safe identity encoding. Anything outside
 * [A-Za-z0-9-] becomes "_" + two hex digits per UTF-8 byte, so the
 * underscore itself is always escaped.
 *
 *   whatsapp:+62812 -> whatsapp_3a_2b62812
 */
export function encodeIdentity(identity: string): string {
  if (identity.length === 0) {
    throw new ValidationError('Identity must not be empty');
  }

  let out = '';
  for (const char of identity) {
    if (/^[A-Za-z0-9-]$/.test(char)) {
      out += char;
      continue;
    }
    for (const byte of Buffer.from(char, 'utf8')) {
      out += '_' + byte.toString(16).padStart(2, '0');
    }
  }
  return out;
}

export function artifactFileName(identity: string, kind: ArtifactKind): string {
  return `${kind}_${encodeIdentity(identity)}.${ARTIFACT_EXTENSIONS[kind]}`;
}

export class FileExporter {
  private readonly rootDir: string;
  private readonly baseUrl: string;
  private readonly publicPath: string;

  constructor(options: FileExporterOptions) {
    this.rootDir = path.resolve(options.rootDir);
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.publicPath = '/' + options.publicPath.replace(/^\/+|\/+$/g, '');
  }

  urlFor(fileName: string): string {
    return `${this.baseUrl}${this.publicPath}/${fileName}`;
  }

  /**
   * Writes to a temp file next to the target, then renames it into place.
   * Concurrent exports for the same identity and kind: last rename wins,
   * readers never see a partial file.
   */
  async export(artifact: Buffer, identity: string, kind: ArtifactKind): Promise<ArtifactReference> {
    const fileName = artifactFileName(identity, kind);
    const filePath = path.join(this.rootDir, fileName);
    const tempPath = path.join(this.rootDir, `.${fileName}.${uuid()}.tmp`);

    try {
      await fs.mkdir(this.rootDir, { recursive: true });
      await fs.writeFile(tempPath, artifact);
      await fs.rename(tempPath, filePath);
    } catch (err) {
      await fs.rm(tempPath, { force: true }).catch((cleanupErr: unknown) => {
        console.error(`[FileExporter] Could not remove temp file ${tempPath}:`, errMessage(cleanupErr));
      });
      console.error(`[FileExporter] Export of ${fileName} failed:`, errMessage(err));
      throw new ExportFailure(`Could not save ${kind} artifact`, err);
    }

    console.log(`[FileExporter] Saved ${fileName} (${artifact.length} bytes)`);
    return { fileName, filePath, url: this.urlFor(fileName) };
  }
}

import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';

import {
  ArtifactWriteError,
  err,
  ok,
  toError,
  type Result,
} from '@portbench/core';

export interface ArtifactOutcome {
  name: string;
  path: string;
  written: boolean;
  error?: ArtifactWriteError;
}

export async function writeArtifact(
  outDir: string,
  fileName: string,
  content: string
): Promise<Result<string, ArtifactWriteError>> {
  const target = path.join(outDir, fileName);
  try {
    await mkdir(outDir, { recursive: true });
    await writeFile(target, content, 'utf8');
    return ok(target);
  } catch (error) {
    return err(new ArtifactWriteError(target, toError(error)));
  }
}

export function toArtifactOutcome(
  name: string,
  outDir: string,
  result: Result<string, ArtifactWriteError>
): ArtifactOutcome {
  return result.ok
    ? { name, path: result.value, written: true }
    : { name, path: path.join(outDir, name), written: false, error: result.error };
}

/**
 * Render then persist one artifact. A renderer that throws is reported as a
 * failed write of that artifact only.
 */
export async function emitArtifact(
  outDir: string,
  fileName: string,
  render: () => string
): Promise<ArtifactOutcome> {
  let content: string;
  try {
    content = render();
  } catch (error) {
    return toArtifactOutcome(
      fileName,
      outDir,
      err(new ArtifactWriteError(path.join(outDir, fileName), toError(error)))
    );
  }
  return toArtifactOutcome(fileName, outDir, await writeArtifact(outDir, fileName, content));
}

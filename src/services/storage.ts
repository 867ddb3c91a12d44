import path from 'node:path';
import { mkdir, writeFile } from 'node:fs/promises';
import { env } from '@/config/env';

export type ArtifactContent = string | Uint8Array;

export interface ArtifactStore {
  /** Persists `content` and returns the URL it is served from. */
  store(runId: string, artifactName: string, content: ArtifactContent): Promise<string>;
}

export function sanitizeName(name: string): string {
  return name.replace(/[^a-zA-Z0-9._-]/g, '_');
}

export function artifactUrl(runId: string, artifactName: string): string {
  return `/api/artifacts/${encodeURIComponent(sanitizeName(runId))}/${encodeURIComponent(
    sanitizeName(artifactName)
  )}`;
}

export async function storeArtifact(
  runId: string,
  artifactName: string,
  content: ArtifactContent
): Promise<string> {
  const dir = path.join(env.artifactRootPath, sanitizeName(runId));
  await mkdir(dir, { recursive: true });
  const filePath = path.join(dir, sanitizeName(artifactName));
  if (typeof content === 'string') {
    await writeFile(filePath, content, 'utf8');
  } else {
    await writeFile(filePath, content);
  }
  return artifactUrl(runId, artifactName);
}

export const fileArtifactStore: ArtifactStore = {
  store: storeArtifact
};

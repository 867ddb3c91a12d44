import { CAPTION_ARTIFACTS, FILLER_WORDS } from '@/config/pipeline';

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function collapseSpaces(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/** Drops bracketed caption cues such as `[Music]`. */
export function stripCaptionArtifacts(text: string, artifacts: readonly string[] = CAPTION_ARTIFACTS): string {
  let result = text;
  for (const artifact of artifacts) {
    result = result.replace(new RegExp(escapeRegExp(artifact), 'gi'), ' ');
  }
  return collapseSpaces(result);
}

export function removeFillerWords(text: string, extraFillers: readonly string[] = []): string {
  let result = text;
  for (const filler of [...FILLER_WORDS, ...extraFillers]) {
    result = result.replace(new RegExp(`\\b${escapeRegExp(filler)}\\b`, 'gi'), '');
  }
  return collapseSpaces(result);
}

export function fixCapitalization(text: string): string {
  return text
    .split(/([.!?]+\s+)/)
    .map((part, index) =>
      index % 2 === 0 && part.length > 0 ? `${part.charAt(0).toUpperCase()}${part.slice(1)}` : part
    )
    .join('');
}

export function repairPunctuation(text: string): string {
  let result = text;
  if (result && !/[.!?]$/.test(result)) {
    result += '.';
  }

  return result
    .replace(/([.!?,;:])([A-Za-z])/g, '$1 $2')
    .replace(/\s+([.!?,;:])/g, '$1')
    .replace(/([.!?]){2,}/g, '$1');
}

export function cleanText(text: string, opts: { removeFillers?: boolean } = {}): string {
  let result = stripCaptionArtifacts(text);
  if (opts.removeFillers ?? true) {
    result = removeFillerWords(result);
  }
  if (!result) {
    return '';
  }
  return fixCapitalization(repairPunctuation(result));
}

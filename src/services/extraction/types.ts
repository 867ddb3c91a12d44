import type { ErrorDetail } from '@/types/run';
import type {
  ExtractionMode,
  PlaylistEntry,
  PlaylistRef,
  TranscriptResult,
  TranscriptSegment,
  VideoMetadata,
  VideoRef,
  WhisperModelSize
} from '@/types/video';

/** Segments and detected language as returned by a caption or audio engine. */
export interface RawTranscript {
  segments: TranscriptSegment[];
  language: string;
}

export interface MetadataSource {
  resolve(ref: VideoRef, signal?: AbortSignal): Promise<VideoMetadata>;
}

export interface CaptionSource {
  fetch(ref: VideoRef, language: string, signal?: AbortSignal): Promise<RawTranscript>;
}

export interface AudioTranscriber {
  transcribe(
    ref: VideoRef,
    modelSize: WhisperModelSize,
    language: string | undefined,
    signal?: AbortSignal
  ): Promise<RawTranscript>;
}

export interface PlaylistResolver {
  expand(playlist: PlaylistRef, signal?: AbortSignal): Promise<PlaylistEntry[]>;
}

export type ExtractionState = 'captions' | 'audio' | 'succeeded' | 'failed';

export type ExtractionTransition =
  | 'start'
  | 'retry'
  | 'fallback'
  | 'succeed'
  | 'fail';

export interface ExtractionTrailEntry {
  from: ExtractionState | 'init';
  to: ExtractionState;
  transition: ExtractionTransition;
  attempt: number;
  reason?: string;
}

export type ExtractionResult =
  | { state: 'succeeded'; transcript: TranscriptResult; trail: ExtractionTrailEntry[] }
  | { state: 'failed'; error: ErrorDetail; trail: ExtractionTrailEntry[] };

export interface ExtractionRequest {
  ref: VideoRef;
  metadata: VideoMetadata;
  /** Requested language, else the video's declared language, else "en". */
  language: string;
  /** Set only when the caller asked for a language explicitly. */
  requestedLanguage?: string;
  mode?: ExtractionMode;
  signal?: AbortSignal;
}

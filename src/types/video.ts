export type ExtractionMode = 'captions' | 'audio';

export type WhisperModelSize = 'tiny' | 'base' | 'small' | 'medium' | 'large';

export interface VideoRef {
  readonly videoId: string;
  readonly language?: string;
  readonly mode?: ExtractionMode;
}

export interface TranscriptSegment {
  start: number;
  end: number;
  text: string;
}

export interface VideoChapter {
  title: string;
  startSec: number;
  endSec: number;
}

export interface VideoMetadata {
  videoId: string;
  title: string;
  channel: string;
  publishedAt?: string;
  duration: number;
  viewCount: number;
  likeCount: number;
  tags: string[];
  chapters: VideoChapter[];
  description?: string;
  thumbnailUrl?: string;
  language?: string;
  url: string;
}

export interface TranscriptResult {
  segments: TranscriptSegment[];
  sourceMode: ExtractionMode;
  language: string;
  metadata: VideoMetadata;
}

export interface PlaylistEntry {
  videoId: string;
  title: string;
  /** Set when the playlist lists the entry but it cannot be processed (private, deleted). */
  unavailableReason?: string;
}

export interface PlaylistRef {
  playlistId: string;
  url: string;
}

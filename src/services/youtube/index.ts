import type {
  AudioTranscriber,
  CaptionSource,
  MetadataSource,
  PlaylistResolver
} from '@/services/extraction/types';
import { transcribeAudio } from '@/services/youtube/audio';
import { fetchCaptions } from '@/services/youtube/captions';
import { fetchVideoMetadata } from '@/services/youtube/metadata';
import { expandPlaylist } from '@/services/youtube/playlist';

export const youtubeMetadataSource: MetadataSource = {
  resolve: fetchVideoMetadata
};

export const youtubeCaptionSource: CaptionSource = {
  fetch: fetchCaptions
};

export const whisperAudioTranscriber: AudioTranscriber = {
  transcribe: transcribeAudio
};

export const youtubePlaylistResolver: PlaylistResolver = {
  expand: expandPlaylist
};

export type PlaybackState = 'off' | 'idle' | 'playing' | 'paused' | 'standby' | 'buffering';

export type QoS = 0 | 1 | 2;

export interface TrackInfo {
  title: string | null;
  artist: string | null;
  albumName: string | null;
  albumArtist: string | null;
  durationSeconds: number | null;
  positionSeconds: number | null;
  positionTimestamp: Date | null;
  imageUrl: string | null;
  mediaId: string | null;
}

export interface DeviceInfo {
  identifiers: Array<[string, string]>;
  name: string;
  manufacturer?: string;
  model?: string;
  swVersion?: string;
}

/**
 * Locally held copy of one agent's player state. Written only by the
 * inbound snapshot handler and by optimistic command updates.
 */
export interface DeviceMirror {
  readonly deviceId: string;
  readonly deviceName: string;
  readonly entityId: string;
  readonly commandTopic: string;
  playback: PlaybackState;
  /** 0-100 */
  volume: number;
  muted: boolean;
  track: TrackInfo;
  /** Epoch ms of the last accepted snapshot, 0 before the first one. */
  lastUpdated: number;
  destroyed: boolean;
}

export interface CommandEnvelope {
  command: string;
  data: unknown;
  info: PlayMediaInfo | null;
}

export interface PlayMediaInfo {
  title: string | null;
  artist: string | null;
  albumtitle: string | null;
  albumartist: string | null;
  image_url: string | null;
}

export interface MediaImage {
  url?: string;
}

export interface PlayMediaMetadata {
  title?: string | null;
  artist?: string | null;
  album_name?: string | null;
  albumtitle?: string | null;
  album_artist?: string | null;
  albumartist?: string | null;
  images?: MediaImage[] | null;
  imageUrl?: string | null;
}

export interface PlayMediaExtra {
  metadata?: PlayMediaMetadata | null;
}

export type MediaPlayerFeature =
  | 'volume_mute'
  | 'pause'
  | 'stop'
  | 'previous_track'
  | 'next_track'
  | 'volume_step'
  | 'play'
  | 'play_media'
  | 'seek'
  | 'browse_media'
  | 'volume_set'
  | 'turn_off';

export interface MediaPlayerView {
  entityId: string;
  uniqueId: string;
  name: string;
  available: boolean;
  state: PlaybackState;
  volumeLevel: number;
  isVolumeMuted: boolean;
  mediaTitle: string | null;
  mediaArtist: string | null;
  mediaAlbumName: string | null;
  mediaAlbumArtist: string | null;
  mediaDuration: number | null;
  mediaPosition: number | null;
  mediaPositionUpdatedAt: string | null;
  mediaImageUrl: string | null;
  mediaContentId: string | null;
  mediaContentType: 'music';
  deviceClass: 'speaker';
  supportedFeatures: MediaPlayerFeature[];
  deviceInfo: DeviceInfo;
  lastUpdated: string | null;
}

import { z } from 'zod';
import { MalformedMessageError } from '../utils/errors.js';
import type { DeviceMirror, PlaybackState, TrackInfo } from '../types/media-player.js';

/** A mirror is live while its last snapshot is younger than this. */
export const AVAILABILITY_WINDOW_MS = 5000;

const snapshotSchema = z.object({
  state: z.string(),
  volume: z.number().finite(),
  muted: z.boolean(),
  title: z.string().nullish(),
  artist: z.string().nullish(),
  albumtitle: z.string().nullish(),
  albumartist: z.string().nullish(),
  duration: z.number().nullish(),
  currentposition: z.number().nullish(),
});

export type StateSnapshot = z.infer<typeof snapshotSchema>;

/**
 * Decode a state topic payload. Throws MalformedMessageError when the body is
 * not JSON or lacks one of state/volume/muted, so nothing is ever applied
 * from a partial message.
 */
export function decodeSnapshot(payload: Buffer | string, topic?: string): StateSnapshot {
  let body: unknown;
  try {
    body = JSON.parse(payload.toString());
  } catch (error) {
    throw new MalformedMessageError('State payload is not valid JSON', topic, { cause: error });
  }

  const result = snapshotSchema.safeParse(body);
  if (!result.success) {
    const fields = result.error.errors.map((issue) => issue.path.join('.') || '(root)').join(', ');
    throw new MalformedMessageError(`State payload is invalid: ${fields}`, topic, { cause: result.error });
  }
  return result.data;
}

export function parsePlaybackState(raw: string): PlaybackState {
  switch (raw.toLowerCase()) {
    case 'off':
      return 'off';
    case 'idle':
      return 'idle';
    case 'playing':
      return 'playing';
    case 'paused':
      return 'paused';
    case 'standby':
      return 'standby';
    case 'buffering':
      return 'buffering';
    default:
      return 'idle';
  }
}

export function clampVolume(volume: number): number {
  return Math.min(100, Math.max(0, Math.round(volume)));
}

export function emptyTrack(): TrackInfo {
  return {
    title: null,
    artist: null,
    albumName: null,
    albumArtist: null,
    durationSeconds: null,
    positionSeconds: null,
    positionTimestamp: null,
    imageUrl: null,
    mediaId: null,
  };
}

/**
 * Merge an authoritative snapshot into the mirror.
 *
 * Volume and mute always overwrite. Track identity (title, artist, album,
 * album artist) is replaced as one unit and only when the snapshot carries a
 * title; duration and position follow every snapshot that is not "off".
 * An "off" snapshot leaves all track fields as they were.
 */
export function applySnapshot(mirror: DeviceMirror, snapshot: StateSnapshot): void {
  const playback = parsePlaybackState(snapshot.state);

  mirror.playback = playback;
  mirror.volume = clampVolume(snapshot.volume);
  mirror.muted = snapshot.muted;

  if (playback !== 'off') {
    if (snapshot.title) {
      mirror.track = {
        ...mirror.track,
        title: snapshot.title,
        artist: snapshot.artist ?? null,
        albumName: snapshot.albumtitle ?? null,
        albumArtist: snapshot.albumartist ?? null,
      };
    }

    if (snapshot.duration !== undefined) {
      mirror.track.durationSeconds = snapshot.duration;
    }
    if (snapshot.currentposition !== undefined) {
      mirror.track.positionSeconds = snapshot.currentposition;
      mirror.track.positionTimestamp = new Date();
    }
  }

  mirror.lastUpdated = Date.now();
}

export function isAvailable(mirror: DeviceMirror, now: number = Date.now()): boolean {
  return now - mirror.lastUpdated < AVAILABILITY_WINDOW_MS;
}

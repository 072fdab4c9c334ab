import { promises as fs } from 'fs';
import path from 'path';

const MEDIA_SOURCE_PREFIX = 'media-source://';
const LOCAL_ROOT_ID = `${MEDIA_SOURCE_PREFIX}media_source/local`;

const mimeTypes: Record<string, string> = {
  '.mp3': 'audio/mpeg',
  '.wav': 'audio/wav',
  '.ogg': 'audio/ogg',
  '.opus': 'audio/opus',
  '.flac': 'audio/flac',
  '.aac': 'audio/aac',
  '.m4a': 'audio/mp4',
  '.mp4': 'video/mp4',
  '.mkv': 'video/x-matroska',
  '.png': 'image/png',
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
};

export interface ResolvedMedia {
  url: string;
  mimeType: string;
}

export interface BrowseNode {
  title: string;
  mediaContentId: string;
  mediaContentType: string;
  canPlay: boolean;
  canExpand: boolean;
  children?: BrowseNode[];
}

/**
 * Turns indirect media references into URLs the agent can fetch, and lists
 * what can be played.
 */
export interface MediaResolver {
  isMediaSourceId(mediaId: string): boolean;
  resolve(mediaId: string, entityId: string): Promise<ResolvedMedia>;
  /** Make relative URLs absolute so the agent can reach them. */
  processPlayMediaUrl(url: string): string;
  browse(mediaContentId?: string): Promise<BrowseNode>;
}

export function mimeTypeFor(filename: string): string {
  return mimeTypes[path.extname(filename).toLowerCase()] ?? 'application/octet-stream';
}

/**
 * Media source over a local directory, served by the HTTP API under
 * /media/local.
 */
export class LocalMediaSource implements MediaResolver {
  private readonly root: string;
  private readonly publicUrl: string;

  constructor(root: string, publicUrl: string) {
    this.root = path.resolve(root);
    this.publicUrl = publicUrl.replace(/\/+$/, '');
  }

  isMediaSourceId(mediaId: string): boolean {
    return mediaId.startsWith(MEDIA_SOURCE_PREFIX);
  }

  async resolve(mediaId: string, _entityId: string): Promise<ResolvedMedia> {
    const relative = this.relativePath(mediaId);
    const stats = await fs.stat(this.absolutePath(relative));
    if (!stats.isFile()) {
      throw new Error(`${mediaId} is not a playable file`);
    }

    return {
      url: `${this.publicUrl}/media/local/${encodeURI(relative)}`,
      mimeType: mimeTypeFor(relative),
    };
  }

  processPlayMediaUrl(url: string): string {
    if (url.startsWith('/')) {
      return `${this.publicUrl}${url}`;
    }
    return url;
  }

  async browse(mediaContentId: string = LOCAL_ROOT_ID): Promise<BrowseNode> {
    const relative = this.relativePath(mediaContentId);
    const entries = await fs.readdir(this.absolutePath(relative), { withFileTypes: true });

    const children = entries
      .filter((entry) => entry.isDirectory() || entry.isFile())
      .sort((a, b) => a.name.localeCompare(b.name))
      .map((entry): BrowseNode => {
        const childPath = relative ? `${relative}/${entry.name}` : entry.name;
        const isDirectory = entry.isDirectory();
        return {
          title: entry.name,
          mediaContentId: `${LOCAL_ROOT_ID}/${childPath}`,
          mediaContentType: isDirectory ? 'directory' : mimeTypeFor(entry.name),
          canPlay: !isDirectory,
          canExpand: isDirectory,
        };
      });

    return {
      title: relative ? path.posix.basename(relative) : 'Local Media',
      mediaContentId,
      mediaContentType: 'directory',
      canPlay: false,
      canExpand: true,
      children,
    };
  }

  private relativePath(mediaId: string): string {
    if (mediaId !== LOCAL_ROOT_ID && !mediaId.startsWith(`${LOCAL_ROOT_ID}/`)) {
      throw new Error(`Unknown media source: ${mediaId}`);
    }
    return decodeURIComponent(mediaId.slice(LOCAL_ROOT_ID.length).replace(/^\/+/, ''));
  }

  private absolutePath(relative: string): string {
    const absolute = path.resolve(this.root, relative);
    if (absolute !== this.root && !absolute.startsWith(`${this.root}${path.sep}`)) {
      throw new Error(`Media path escapes the media directory: ${relative}`);
    }
    return absolute;
  }
}

import { ApiClient, SPOTIFY_API_BASE } from "./api-client";
import { createLogger } from "./logger";
import { fetchRemainingPages, PAGE_WORKER_COUNT } from "./page-fetcher";
import { normalizeTrackItems, toPlaylistSummaries, toPlaylistSummary } from "./track-normalizer";
import type { CanonicalTrack, PagingResponse, PlaylistSummary, PlaylistWithTracks, SpotifyPlaylist, TrackItem } from "./types";

export const PLAYLISTS_PAGE_SIZE = 50;
export const SAVED_TRACKS_PAGE_SIZE = 50;
export const PLAYLIST_TRACKS_PAGE_SIZE = 100;

const log = createLogger("library");

export interface AccessTokenSource {
  getAccessToken(signal?: AbortSignal): Promise<string>;
}

interface LibraryServiceOptions {
  apiClient?: ApiClient;
  workerCount?: number;
}

export class LibraryService {
  private readonly apiClient: ApiClient;
  private readonly workerCount: number;

  constructor(
    private readonly session: AccessTokenSource,
    options: LibraryServiceOptions = {}
  ) {
    this.apiClient = options.apiClient ?? new ApiClient();
    this.workerCount = options.workerCount ?? PAGE_WORKER_COUNT;
  }

  /** Walks the `next` cursor page by page; the total is not known upfront. */
  async fetchPlaylists(signal?: AbortSignal): Promise<PlaylistSummary[]> {
    const accessToken = await this.session.getAccessToken(signal);
    const playlists: PlaylistSummary[] = [];
    let url: string | null = `${SPOTIFY_API_BASE}/me/playlists?limit=${PLAYLISTS_PAGE_SIZE}`;

    while (url) {
      const page: PagingResponse<SpotifyPlaylist | null> = await this.apiClient.getJson<
        PagingResponse<SpotifyPlaylist | null>
      >(url, accessToken, signal);

      playlists.push(...toPlaylistSummaries(page.items));
      log.debug(`Fetched playlists page offset=${page.offset} items=${page.items.length} collected=${playlists.length}`);
      url = page.next;
    }

    log.info(`Fetched ${playlists.length} playlists.`);
    return playlists;
  }

  async fetchSavedTracks(signal?: AbortSignal): Promise<CanonicalTrack[]> {
    const accessToken = await this.session.getAccessToken(signal);
    const pageUrl = (offset: number): string =>
      `${SPOTIFY_API_BASE}/me/tracks?limit=${SAVED_TRACKS_PAGE_SIZE}&offset=${offset}`;

    const firstPage = await this.apiClient.getJson<PagingResponse<TrackItem>>(pageUrl(0), accessToken, signal);
    const tracks = await this.collectTracks(firstPage.items, firstPage.total, SAVED_TRACKS_PAGE_SIZE, pageUrl, accessToken, signal);

    log.info(`Fetched ${tracks.length} saved tracks (total=${firstPage.total}).`);
    return tracks;
  }

  async fetchPlaylistWithTracks(playlistId: string, signal?: AbortSignal): Promise<PlaylistWithTracks> {
    const accessToken = await this.session.getAccessToken(signal);
    const playlistUrl = `${SPOTIFY_API_BASE}/playlists/${encodeURIComponent(playlistId)}`;
    const pageUrl = (offset: number): string =>
      `${playlistUrl}/tracks?limit=${PLAYLIST_TRACKS_PAGE_SIZE}&offset=${offset}`;

    const playlist = await this.apiClient.getJson<SpotifyPlaylist>(playlistUrl, accessToken, signal);
    const total = playlist.tracks?.total ?? 0;

    const firstPage = await this.apiClient.getJson<PagingResponse<TrackItem>>(pageUrl(0), accessToken, signal);
    const tracks = await this.collectTracks(firstPage.items, total, PLAYLIST_TRACKS_PAGE_SIZE, pageUrl, accessToken, signal);

    log.info(`Fetched playlist ${playlistId} with ${tracks.length} tracks (total=${total}).`);
    return {
      playlist: toPlaylistSummary(playlist),
      tracks
    };
  }

  private async collectTracks(
    firstItems: TrackItem[],
    total: number,
    pageSize: number,
    pageUrl: (offset: number) => string,
    accessToken: string,
    signal?: AbortSignal
  ): Promise<CanonicalTrack[]> {
    const tracks = normalizeTrackItems(firstItems);
    if (total <= firstItems.length) {
      return tracks;
    }

    const slices = await fetchRemainingPages(
      total,
      pageSize,
      async (offset, pageSignal) => {
        const page = await this.apiClient.getJson<PagingResponse<TrackItem>>(pageUrl(offset), accessToken, pageSignal);
        return normalizeTrackItems(page.items);
      },
      { signal, workerCount: this.workerCount }
    );

    for (const slice of slices) {
      tracks.push(...slice.items);
    }

    return tracks;
  }
}

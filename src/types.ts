export interface TokenRecord {
  accessToken: string;
  refreshToken: string;
  /** Absolute unix time in seconds. */
  expiresAt: number;
  scope: string;
  tokenType: string;
}

export interface UserProfile {
  id: string;
  displayName: string;
  email: string;
  avatarUrls: string[];
}

export type AuthStatus =
  | { authenticated: false }
  | {
      authenticated: true;
      displayName: string;
      userId: string;
      avatarUrl: string;
      expiresAt: number;
      scope: string;
    };

export type SessionState = "unauthenticated" | "login-pending" | "authenticated" | "refreshing";

export interface LoginStart {
  url: string;
}

export interface ClientCredentials {
  clientId: string;
  clientSecret: string;
}

export interface PlaylistSummary {
  id: string;
  name: string;
  owner: string;
  tracksTotal: number;
  imageUrl: string;
  isPublic: boolean;
}

export interface ArtistRef {
  id: string;
  name: string;
  externalUrl: string;
}

export interface CanonicalTrack {
  spotifyId: string;
  name: string;
  /** Display names joined with ", ". */
  artists: string;
  artistsData: ArtistRef[];
  artistId: string;
  artistUrl: string;
  albumName: string;
  albumArtist: string;
  albumId: string;
  albumType: string;
  albumUrl: string;
  releaseDate: string;
  trackNumber: number;
  discNumber: number;
  totalTracks: number;
  durationMs: number;
  coverUrl: string;
  externalUrl: string;
  isrc: string;
}

export interface PlaylistWithTracks {
  playlist: PlaylistSummary;
  tracks: CanonicalTrack[];
}

// Spotify Web API payloads. Only the fields read by the normalizer are listed.

export interface SpotifyImage {
  url: string;
  height?: number | null;
  width?: number | null;
}

export interface SpotifyExternalUrls {
  spotify?: string;
}

export interface SpotifyArtist {
  id: string;
  name: string;
  external_urls?: SpotifyExternalUrls;
}

export interface SpotifyAlbum {
  id: string;
  name: string;
  album_type?: string;
  release_date?: string;
  total_tracks?: number;
  images?: SpotifyImage[];
  artists?: SpotifyArtist[];
  external_urls?: SpotifyExternalUrls;
}

export interface SpotifyTrack {
  id: string;
  name: string;
  duration_ms: number;
  track_number?: number;
  disc_number?: number;
  artists?: SpotifyArtist[];
  album?: SpotifyAlbum;
  external_urls?: SpotifyExternalUrls;
  external_ids?: { isrc?: string };
}

export interface TrackItem {
  track: SpotifyTrack | null;
}

export interface PagingResponse<T> {
  items: T[];
  limit: number;
  offset: number;
  total: number;
  next: string | null;
}

export interface SpotifyPlaylist {
  id: string;
  name: string;
  public: boolean | null;
  images?: SpotifyImage[] | null;
  owner?: { id?: string; display_name?: string | null };
  tracks?: { total: number };
}

export interface SpotifyUser {
  id: string;
  display_name: string | null;
  email?: string;
  images?: SpotifyImage[];
}

export interface SpotifyTokenResponse {
  access_token?: string;
  token_type?: string;
  expires_in?: number;
  refresh_token?: string;
  scope?: string;
}

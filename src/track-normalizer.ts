import type {
  ArtistRef,
  CanonicalTrack,
  PlaylistSummary,
  SpotifyArtist,
  SpotifyImage,
  SpotifyPlaylist,
  SpotifyTrack,
  TrackItem
} from "./types";

// Spotify sorts images by decreasing size, so the first one is the largest.
function firstImageUrl(images: SpotifyImage[] | null | undefined): string {
  return images?.[0]?.url ?? "";
}

function joinArtistNames(artists: SpotifyArtist[]): string {
  return artists.map((artist) => artist.name).join(", ");
}

function toArtistRef(artist: SpotifyArtist): ArtistRef {
  return {
    id: artist.id,
    name: artist.name,
    externalUrl: artist.external_urls?.spotify ?? ""
  };
}

export function normalizeTrack(track: SpotifyTrack): CanonicalTrack {
  const artists = track.artists ?? [];
  const album = track.album;
  const artistsData = artists.map(toArtistRef);
  const primary = artistsData[0];

  return {
    spotifyId: track.id,
    name: track.name,
    artists: joinArtistNames(artists),
    artistsData,
    artistId: primary?.id ?? "",
    artistUrl: primary?.externalUrl ?? "",
    albumName: album?.name ?? "",
    albumArtist: joinArtistNames(album?.artists ?? []),
    albumId: album?.id ?? "",
    albumType: album?.album_type ?? "",
    albumUrl: album?.external_urls?.spotify ?? "",
    releaseDate: album?.release_date ?? "",
    trackNumber: track.track_number ?? 0,
    discNumber: track.disc_number ?? 0,
    totalTracks: album?.total_tracks ?? 0,
    durationMs: track.duration_ms,
    coverUrl: firstImageUrl(album?.images),
    externalUrl: track.external_urls?.spotify ?? "",
    isrc: track.external_ids?.isrc ?? ""
  };
}

/** Items without a track (e.g. unavailable in the user's region) are dropped. */
export function normalizeTrackItems(items: TrackItem[]): CanonicalTrack[] {
  const tracks: CanonicalTrack[] = [];

  for (const item of items) {
    if (item.track) {
      tracks.push(normalizeTrack(item.track));
    }
  }

  return tracks;
}

export function toPlaylistSummary(playlist: SpotifyPlaylist): PlaylistSummary {
  return {
    id: playlist.id,
    name: playlist.name,
    owner: playlist.owner?.display_name ?? "",
    tracksTotal: playlist.tracks?.total ?? 0,
    imageUrl: firstImageUrl(playlist.images),
    isPublic: playlist.public === true
  };
}

export function toPlaylistSummaries(items: Array<SpotifyPlaylist | null>): PlaylistSummary[] {
  const playlists: PlaylistSummary[] = [];

  for (const playlist of items) {
    if (playlist) {
      playlists.push(toPlaylistSummary(playlist));
    }
  }

  return playlists;
}

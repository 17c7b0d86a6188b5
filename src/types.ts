export type AssetId = string;

export interface Album {
  id: string;
  albumName: string;
  assetCount: number;
}

export interface SessionConfig {
  host: string;
  apiKey: string;
  libraryRoot: string;
  timeoutMs: number;
  dryRun: boolean;
}

export type AlbumSelection =
  | { kind: 'create'; albumName: string }
  | { kind: 'existing'; album: Album };

export interface BulkIdResult {
  id: string;
  success: boolean;
  error?: string;
}

export type CreateAlbumOutcome = 'created' | 'skipped' | 'simulated' | 'failed';

export interface AppendSummary {
  added: number;
  duplicates: number;
  failed: number;
  simulated: boolean;
}

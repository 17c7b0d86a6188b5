import type { AlbumApi } from './api/immichClient.js';
import { createConsoleReporter, Reporter } from './reporter.js';
import type { AppendSummary, AssetId, BulkIdResult, CreateAlbumOutcome } from './types.js';

const MAX_LISTED_FAILURES = 10;

export interface AlbumManagerOptions {
  dryRun: boolean;
  reporter?: Reporter;
}

export class AlbumManager {
  private api: AlbumApi;
  private dryRun: boolean;
  private reporter: Reporter;

  constructor(api: AlbumApi, options: AlbumManagerOptions) {
    this.api = api;
    this.dryRun = options.dryRun;
    this.reporter = options.reporter ?? createConsoleReporter();
  }

  isDryRun(): boolean {
    return this.dryRun;
  }

  async albumExists(albumName: string): Promise<boolean> {
    const albums = await this.api.getAllAlbums();
    return albums.some(album => album.albumName === albumName);
  }

  /**
   * Creates the album unless one with the same name is already there.
   */
  async createAlbum(albumName: string, assetIds: AssetId[]): Promise<CreateAlbumOutcome> {
    if (await this.albumExists(albumName)) {
      this.reporter.skip(`Album '${albumName}' already exists.`);
      return 'skipped';
    }

    if (this.dryRun) {
      this.reporter.dryRun(`Would create album '${albumName}' with ${assetIds.length} assets.`);
      return 'simulated';
    }

    const album = await this.api.createAlbum(albumName, assetIds);
    if (!album) {
      return 'failed';
    }
    this.reporter.ok(`Album created: ${albumName} (${assetIds.length} assets)`);
    return 'created';
  }

  /**
   * Appends assets and tallies the server's per-asset answers. Returns null
   * when nothing was sent or the server accepted none of the ids.
   */
  async addAssetsToAlbum(albumId: string, assetIds: AssetId[]): Promise<AppendSummary | null> {
    if (assetIds.length === 0) {
      this.reporter.error('No assets to add.');
      return null;
    }

    if (this.dryRun) {
      this.reporter.dryRun(`Would add ${assetIds.length} assets to album.`);
      return { added: assetIds.length, duplicates: 0, failed: 0, simulated: true };
    }

    const results = await this.api.addAssetsToAlbum(albumId, assetIds);
    if (!results) {
      return null;
    }

    const added = results.filter(result => result.success).length;
    const duplicates = results.filter(result => !result.success && result.error === 'duplicate').length;
    const failed = results.filter(result => !result.success && result.error !== 'duplicate');

    if (added + duplicates === 0) {
      this.reporter.error(`None of the ${results.length} assets could be added to the album.`);
      this.reportFailures(failed);
      return null;
    }

    this.reporter.ok(`Added ${added} assets to album.`);
    if (duplicates > 0) {
      this.reporter.info(`  ${duplicates} were already in the album.`);
    }
    this.reportFailures(failed);
    return { added, duplicates, failed: failed.length, simulated: false };
  }

  private reportFailures(failed: BulkIdResult[]): void {
    if (failed.length === 0) {
      return;
    }
    const listed = failed.slice(0, MAX_LISTED_FAILURES).map(f => `${f.id} (${f.error ?? 'unknown'})`);
    if (failed.length > MAX_LISTED_FAILURES) {
      listed.push('…');
    }
    this.reporter.warn(`${failed.length} assets could not be added: ${listed.join(', ')}`);
  }
}

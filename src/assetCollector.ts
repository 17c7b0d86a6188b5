import path from 'path';
import type { FolderAssetSource } from './api/immichClient.js';
import { convertToServerPath, describeFsError, isDirectory, listSubdirectories } from './libraryPaths.js';
import { createConsoleReporter, Reporter } from './reporter.js';
import type { AssetId } from './types.js';

export function dedupePreservingOrder(ids: Iterable<AssetId>): AssetId[] {
  return Array.from(new Set(ids));
}

/**
 * Resolves local folders to the asset ids the server holds for them.
 */
export class AssetCollector {
  private source: FolderAssetSource;
  private libraryRoot: string;
  private reporter: Reporter;

  constructor(source: FolderAssetSource, libraryRoot: string, reporter: Reporter = createConsoleReporter()) {
    this.source = source;
    this.libraryRoot = libraryRoot;
    this.reporter = reporter;
  }

  toServerPath(absPath: string): string {
    return convertToServerPath(absPath, this.libraryRoot);
  }

  async getFolderAssets(absFolderPath: string): Promise<AssetId[]> {
    return this.source.getFolderAssetIds(this.toServerPath(absFolderPath));
  }

  /**
   * Assets of `rootDir` followed by those of every directory below it, each
   * id kept once at its first position.
   */
  async collectRecursive(rootDir: string): Promise<AssetId[]> {
    const allAssetIds: AssetId[] = [...(await this.getFolderAssets(rootDir))];

    const subdirs = await listSubdirectories(rootDir, {
      onError: (dir, error) => this.reporter.warn(`Skipping unreadable folder ${dir}: ${describeFsError(error)}`)
    });

    for (const subdir of subdirs) {
      const subdirAssets = await this.getFolderAssets(subdir);
      allAssetIds.push(...subdirAssets);
      if (subdirAssets.length > 0) {
        this.reporter.info(`  Found ${subdirAssets.length} assets in: ${this.toServerPath(subdir)}`);
      }
    }

    return dedupePreservingOrder(allAssetIds);
  }

  /**
   * A directory is collected recursively; a file stands for the folder that
   * contains it.
   */
  async collectForTarget(targetPath: string): Promise<AssetId[]> {
    if (await isDirectory(targetPath)) {
      return this.collectRecursive(targetPath);
    }
    return this.getFolderAssets(path.dirname(targetPath));
  }
}

#!/usr/bin/env node

import chalk from 'chalk';
import boxen from 'boxen';
import Table from 'cli-table3';
import gradient from 'gradient-string';
import ora from 'ora';
import type { Ora } from 'ora';
import { ImmichClient } from './api/immichClient.js';
import { AlbumManager } from './albumManager.js';
import { AssetCollector } from './assetCollector.js';
import { HELP_TEXT, parseArgs } from './cli.js';
import { maskApiKey, readEnvDefaults } from './config.js';
import { readDotEnv } from './env.js';
import {
  confirm,
  formatAlbumChoice,
  isPromptCancelled,
  promptApiKey,
  promptHost,
  promptLibraryRoot,
  promptTargetPath,
  selectAlbum
} from './prompts.js';
import { createConsoleReporter, pauseSpinnerWhile } from './reporter.js';
import type { Album, AlbumSelection, AssetId, SessionConfig } from './types.js';

interface CollectedTarget {
  targetPath: string;
  assetIds: AssetId[];
}

class FolderAlbumTool {
  private dryRun: boolean;
  private spinner: Ora | undefined;
  private reporter = pauseSpinnerWhile(createConsoleReporter(), () => this.spinner);

  constructor(options: { dryRun: boolean }) {
    this.dryRun = options.dryRun;
  }

  private showBanner(): void {
    const title = gradient.pastel.multiline([
      '╔═══════════════════════════════════════════════╗',
      '║                                               ║',
      '║     IMMICH FOLDER ALBUMS                      ║',
      '║     Library folders → albums                  ║',
      '║                                               ║',
      '╚═══════════════════════════════════════════════╝'
    ].join('\n'));

    console.log('\n' + title + '\n');
    if (this.dryRun) {
      console.log(chalk.magenta.bold('  DRY-RUN: no albums will be created or changed\n'));
    }
  }

  private async configure(): Promise<SessionConfig> {
    console.log(chalk.bold.cyan('━━━━━━━━ CONFIGURATION ━━━━━━━━\n'));
    // Shell variables win over the .env file.
    const defaults = readEnvDefaults({ ...(await readDotEnv()), ...process.env });

    const host = await promptHost(defaults.host);
    const apiKey = await promptApiKey(defaults.apiKey);
    const libraryRoot = await promptLibraryRoot(defaults.libraryRoot);

    return { host, apiKey, libraryRoot, timeoutMs: defaults.timeoutMs, dryRun: this.dryRun };
  }

  private showStatus(config: SessionConfig, client: ImmichClient, reachable: boolean): void {
    const statusTable = new Table({
      style: { head: ['cyan'] },
      colWidths: [20, 56]
    });

    statusTable.push(
      ['🌐 Server', chalk.green(client.getBaseUrl())],
      ['📡 Reachable', reachable ? chalk.green('● yes') : chalk.yellow('○ no answer to ping')],
      ['🔑 API key', chalk.white(maskApiKey(config.apiKey))],
      ['📁 Library root', chalk.blue(config.libraryRoot)],
      ['⚙️  Mode', config.dryRun ? chalk.magenta('dry-run') : chalk.white('live')]
    );

    console.log('');
    console.log(statusTable.toString());
    console.log('');
  }

  private async withSpinner<T>(text: string, task: () => Promise<T>, done: (result: T) => string): Promise<T> {
    const spinner = ora(text).start();
    this.spinner = spinner;
    try {
      const result = await task();
      spinner.succeed(chalk.green(done(result)));
      return result;
    } finally {
      if (spinner.isSpinning) {
        spinner.stop();
      }
      this.spinner = undefined;
    }
  }

  private async loadAlbums(client: ImmichClient): Promise<Album[]> {
    const albums = await this.withSpinner(
      'Loading albums...',
      () => client.getAllAlbums(),
      result => `Found ${result.length} albums`
    );

    if (albums.length > 0) {
      const albumTable = new Table({
        head: ['#', 'Album', 'Assets'],
        style: { head: ['cyan'], border: ['grey'] }
      });
      albums.forEach((album, idx) => {
        albumTable.push([String(idx + 1), album.albumName || chalk.dim('Untitled album'), String(album.assetCount)]);
      });
      console.log(albumTable.toString());
    }
    return albums;
  }

  private async chooseTarget(collector: AssetCollector, libraryRoot: string): Promise<CollectedTarget | null> {
    let result: CollectedTarget | null = null;
    let keepAsking = true;

    while (keepAsking) {
      const targetPath = await promptTargetPath(libraryRoot);
      console.log('');
      const assetIds = await this.withSpinner(
        `Querying assets under: ${targetPath}`,
        () => collector.collectForTarget(targetPath),
        ids => `Found ${ids.length} assets at this path`
      );

      if (assetIds.length > 0) {
        result = { targetPath, assetIds };
        keepAsking = false;
      } else {
        this.reporter.warn('No assets found at this path');
        keepAsking = await confirm('Enter another path?', true);
      }
    }
    return result;
  }

  private async apply(manager: AlbumManager, selection: AlbumSelection, assetIds: AssetId[]): Promise<boolean> {
    const count = assetIds.length;

    if (selection.kind === 'create') {
      const outcome = await manager.createAlbum(selection.albumName, assetIds);
      if (outcome === 'simulated') {
        this.showSummary(`Simulation complete: would create album '${selection.albumName}' with ${count} assets`, 'magenta');
      } else if (outcome === 'created') {
        this.showSummary(`Created album '${selection.albumName}' with ${count} assets`, 'green');
      } else if (outcome === 'failed') {
        console.log(chalk.red('\nFailed to create the new album.'));
        return false;
      }
      return true;
    }

    const albumName = selection.album.albumName;
    const summary = await manager.addAssetsToAlbum(selection.album.id, assetIds);
    if (!summary) {
      console.log(chalk.red('\nFailed to add assets to the album.'));
      return false;
    }
    if (summary.simulated) {
      this.showSummary(`Simulation complete: would add ${summary.added} assets to album '${albumName}'`, 'magenta');
    } else {
      const already = summary.duplicates > 0 ? `, ${summary.duplicates} already there` : '';
      this.showSummary(`Added ${summary.added} assets to album '${albumName}'${already}`, 'green');
    }
    return true;
  }

  private showSummary(message: string, color: 'green' | 'magenta'): void {
    console.log('');
    console.log(boxen(
      color === 'green' ? chalk.green.bold(`✓ ${message}`) : chalk.magenta.bold(message),
      {
        padding: { top: 0, bottom: 0, left: 1, right: 1 },
        margin: { top: 0, bottom: 1 },
        borderStyle: 'round',
        borderColor: color
      }
    ));
  }

  private async session(): Promise<void> {
    const config = await this.configure();

    const client = new ImmichClient(config.host, config.apiKey, {
      timeoutMs: config.timeoutMs,
      reporter: this.reporter
    });
    const collector = new AssetCollector(client, config.libraryRoot, this.reporter);
    const manager = new AlbumManager(client, { dryRun: config.dryRun, reporter: this.reporter });

    const reachable = await this.withSpinner(
      'Contacting server...',
      () => client.ping(),
      result => (result ? 'Server answered' : 'No answer from server')
    );
    this.showStatus(config, client, reachable);

    console.log(chalk.bold.cyan('━━━━━━━━ ALBUM ━━━━━━━━\n'));
    const albums = await this.loadAlbums(client);
    const selection = await selectAlbum(albums);

    if (selection.kind === 'create') {
      console.log(chalk.cyan(`\nWill create new album: ${chalk.bold(selection.albumName)}`));
    } else {
      console.log(chalk.cyan(`\nSelected existing album: ${chalk.bold(formatAlbumChoice(selection.album))}`));
    }

    const target = await this.chooseTarget(collector, config.libraryRoot);
    if (!target) {
      console.log(chalk.yellow('Operation cancelled.'));
      return;
    }

    console.log('');
    const ok = await this.apply(manager, selection, target.assetIds);
    if (!ok) {
      process.exitCode = 1;
    }
  }

  async run(): Promise<void> {
    this.showBanner();

    try {
      await this.session();
    } catch (error) {
      if (isPromptCancelled(error)) {
        console.log(chalk.yellow('\nOperation cancelled.'));
        return;
      }
      throw error;
    }
  }
}

// Main entry point
const options = parseArgs(process.argv.slice(2));
if (options.help) {
  console.log(HELP_TEXT);
  process.exit(0);
} else if (options.unknown.length > 0) {
  console.log(chalk.red(`Unknown argument: ${options.unknown.join(' ')}`));
  console.log(HELP_TEXT);
  process.exit(1);
} else {
  process.on('SIGINT', () => {
    console.log(chalk.yellow('\nOperation cancelled.'));
    process.exit(0);
  });

  const tool = new FolderAlbumTool({ dryRun: options.dryRun });
  tool.run().catch(error => {
    console.error(chalk.red.bold('\n❌ Fatal error:'), error);
    process.exit(1);
  });
}

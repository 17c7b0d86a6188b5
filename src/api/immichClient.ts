/**
 * Immich API Client
 *
 * Thin wrapper over the handful of Immich REST endpoints the album tool uses.
 * Every call is attempted once; failures are reported and degrade to an
 * empty or null result so the interactive session can carry on.
 */

import axios, { AxiosAdapter, AxiosInstance } from 'axios';
import { buildApiBaseUrl, buildHeaders, DEFAULT_TIMEOUT_MS } from '../config.js';
import { createConsoleReporter, Reporter } from '../reporter.js';
import type { Album, AssetId, BulkIdResult } from '../types.js';

export interface ImmichClientOptions {
  timeoutMs?: number;
  reporter?: Reporter;
  /** Replaces the HTTP transport; used by tests to stay in-process. */
  adapter?: AxiosAdapter;
}

export interface FolderAssetSource {
  getFolderAssetIds(serverPath: string): Promise<AssetId[]>;
}

export interface AlbumApi {
  getAllAlbums(): Promise<Album[]>;
  createAlbum(albumName: string, assetIds: AssetId[]): Promise<Album | null>;
  addAssetsToAlbum(albumId: string, assetIds: AssetId[]): Promise<BulkIdResult[] | null>;
}

export class ImmichResponseError extends Error {
  constructor(endpoint: string) {
    super(`Unexpected response from ${endpoint}`);
    this.name = 'ImmichResponseError';
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseAlbum(value: unknown, endpoint: string): Album {
  if (!isRecord(value) || typeof value.id !== 'string') {
    throw new ImmichResponseError(endpoint);
  }
  return {
    id: value.id,
    albumName: typeof value.albumName === 'string' ? value.albumName : '',
    assetCount: typeof value.assetCount === 'number' ? value.assetCount : 0
  };
}

function parseAssetIds(data: unknown): AssetId[] {
  if (!Array.isArray(data)) {
    throw new ImmichResponseError('/view/folder');
  }
  return data.map(item => {
    if (!isRecord(item) || typeof item.id !== 'string') {
      throw new ImmichResponseError('/view/folder');
    }
    return item.id;
  });
}

function parseBulkResults(data: unknown, endpoint: string): BulkIdResult[] {
  if (!Array.isArray(data)) {
    throw new ImmichResponseError(endpoint);
  }
  return data.map(item => {
    if (!isRecord(item) || typeof item.id !== 'string' || typeof item.success !== 'boolean') {
      throw new ImmichResponseError(endpoint);
    }
    return {
      id: item.id,
      success: item.success,
      error: typeof item.error === 'string' ? item.error : undefined
    };
  });
}

export function describeError(error: unknown): string {
  if (axios.isAxiosError(error)) {
    const data: unknown = error.response?.data;
    if (isRecord(data)) {
      const detail = Array.isArray(data.message) ? data.message.join(', ') : data.message;
      if (typeof detail === 'string' && detail) {
        return `${error.message} (${detail})`;
      }
    }
    return error.message;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

export class ImmichClient implements FolderAssetSource, AlbumApi {
  private client: AxiosInstance;
  private reporter: Reporter;

  constructor(host: string, apiKey: string, options: ImmichClientOptions = {}) {
    this.reporter = options.reporter ?? createConsoleReporter();
    this.client = axios.create({
      baseURL: buildApiBaseUrl(host),
      timeout: options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
      headers: buildHeaders(apiKey),
      adapter: options.adapter
    });
  }

  getBaseUrl(): string {
    return this.client.defaults.baseURL ?? '';
  }

  /**
   * Check if the server answers at all
   */
  async ping(): Promise<boolean> {
    try {
      const response = await this.client.get<unknown>('/server/ping');
      return isRecord(response.data) && response.data.res === 'pong';
    } catch {
      return false;
    }
  }

  /**
   * Asset ids the server files under a library-relative folder path
   */
  async getFolderAssetIds(serverPath: string): Promise<AssetId[]> {
    try {
      const response = await this.client.get<unknown>('/view/folder', { params: { path: serverPath } });
      return parseAssetIds(response.data);
    } catch (error) {
      this.reporter.error(`Failed to get assets for '${serverPath}': ${describeError(error)}`);
      return [];
    }
  }

  async getAllAlbums(): Promise<Album[]> {
    try {
      const response = await this.client.get<unknown>('/albums');
      if (!Array.isArray(response.data)) {
        throw new ImmichResponseError('/albums');
      }
      return response.data.map(item => parseAlbum(item, '/albums'));
    } catch (error) {
      this.reporter.error(`Failed to get albums: ${describeError(error)}`);
      return [];
    }
  }

  async createAlbum(albumName: string, assetIds: AssetId[]): Promise<Album | null> {
    try {
      const response = await this.client.post<unknown>('/albums', {
        albumName,
        assetIds,
        description: ''
      });
      return parseAlbum(response.data, '/albums');
    } catch (error) {
      this.reporter.error(`Failed to create album '${albumName}': ${describeError(error)}`);
      return null;
    }
  }

  async addAssetsToAlbum(albumId: string, assetIds: AssetId[]): Promise<BulkIdResult[] | null> {
    const endpoint = `/albums/${encodeURIComponent(albumId)}/assets`;
    try {
      const response = await this.client.put<unknown>(endpoint, { ids: assetIds });
      return parseBulkResults(response.data, endpoint);
    } catch (error) {
      this.reporter.error(`Failed to add assets to album: ${describeError(error)}`);
      return null;
    }
  }
}

export default ImmichClient;

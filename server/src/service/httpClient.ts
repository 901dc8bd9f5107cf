import fetch from 'node-fetch';

export interface FetchRequestInit {
  method?: string;
  headers?: Record<string, string>;
  body?: string;
  /** ミリ秒。0 は無制限（node-fetch の拡張オプション） */
  timeout?: number;
}

export interface FetchResponseLike {
  ok: boolean;
  status: number;
  statusText: string;
  json(): Promise<unknown>;
}

/** 外部APIの呼び出し口。テストでは偽の実装を注入する。 */
export type FetchLike = (
  url: string,
  init?: FetchRequestInit
) => Promise<FetchResponseLike>;

export const defaultFetch: FetchLike = fetch;

export const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

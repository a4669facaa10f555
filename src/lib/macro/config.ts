/**
 * マクロパイプライン設定
 *
 * @description 環境変数を zod で検証して取得トポロジーを決める
 */

import { z } from 'zod';
import { SOURCE_TOPOLOGIES, type SourceTopology } from './types';

/** 地域別HTMLの取得タイムアウト（ms、固定） */
export const HTML_FETCH_TIMEOUT_MS = 6_000;

/** 共通JSONエンドポイントの取得タイムアウト（ms、固定） */
export const JSON_FETCH_TIMEOUT_MS = 8_000;

/** スナップショットの有効期間（12時間） */
export const SNAPSHOT_TTL_MS = 12 * 60 * 60 * 1000;

/** 重いデスクトップ版を避けるためモバイル端末として取得する */
export const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Linux; Android 10; Pixel 4 XL) ' +
  'AppleWebKit/537.36 (KHTML, like Gecko) ' +
  'Chrome/124.0 Mobile Safari/537.36';

const emptyToUndefined = (value: unknown) => (value === '' ? undefined : value);

export const MacroEnvSchema = z
  .object({
    MACRO_SOURCE: z.preprocess(emptyToUndefined, z.enum(SOURCE_TOPOLOGIES).default('html')),
    MACRO_JSON_ENDPOINT: z.preprocess(emptyToUndefined, z.string().url().optional()),
    MACRO_USER_AGENT: z.preprocess(emptyToUndefined, z.string().optional()),
  })
  .superRefine((env, ctx) => {
    if (env.MACRO_SOURCE === 'json' && !env.MACRO_JSON_ENDPOINT) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['MACRO_JSON_ENDPOINT'],
        message: 'MACRO_JSON_ENDPOINT is required when MACRO_SOURCE=json',
      });
    }
  });

export interface MacroConfig {
  topology: SourceTopology;
  /** JSONトポロジーの取得先 */
  jsonEndpoint?: string;
  userAgent: string;
}

/**
 * 設定エラー
 */
export class MacroConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid macro configuration: ${issues.join('; ')}`);
    this.name = 'MacroConfigError';
  }
}

/**
 * 環境変数から設定を読み込む
 *
 * @throws {MacroConfigError} 値が不正、または json なのにエンドポイント未設定
 */
export function loadMacroConfig(env: NodeJS.ProcessEnv = process.env): MacroConfig {
  const parsed = MacroEnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new MacroConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  return {
    topology: parsed.data.MACRO_SOURCE,
    jsonEndpoint: parsed.data.MACRO_JSON_ENDPOINT,
    userAgent: parsed.data.MACRO_USER_AGENT ?? DEFAULT_USER_AGENT,
  };
}

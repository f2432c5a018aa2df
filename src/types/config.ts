import { z } from 'zod';

/**
 * ターゲットOS
 *
 * 署名ステップのファイル名照合（Windowsでは拡張子を除いて照合）に使う。
 */
export const TargetOsSchema = z.enum(['windows', 'linux', 'macos']);
export type TargetOs = z.infer<typeof TargetOsSchema>;

/**
 * 設定オーバーライド値（プロンプトのデフォルトを置き換える）
 */
const SettingOverridesSchema = z.record(z.string(), z.union([z.string(), z.boolean()]));

/**
 * GitHub設定のスキーマ
 */
const GitHubConfigSchema = z
  .object({
    /** GitHub API Base URL */
    apiBaseUrl: z.string().default('https://api.github.com'),
    /** リポジトリオーナー（省略時は remote URL から推定） */
    owner: z.string().optional(),
    /** リポジトリ名（省略時は remote URL から推定） */
    repo: z.string().optional(),
    /** トークンを読む環境変数名 */
    tokenEnvName: z.string().default('GITHUB_TOKEN'),
  })
  .default({
    apiBaseUrl: 'https://api.github.com',
    tokenEnvName: 'GITHUB_TOKEN',
  });

const ChangelogConfigSchema = z
  .object({
    /** 変更履歴ファイル（リポジトリルートからの相対パス） */
    file: z.string().default('CHANGELOG.md'),
  })
  .default({ file: 'CHANGELOG.md' });

const ReleaseConfigSchema = z
  .object({
    /** タグとコミットをプッシュするリモート */
    remote: z.string().default('origin'),
  })
  .default({ remote: 'origin' });

/**
 * ビルド設定のスキーマ
 */
const BuildConfigSchema = z
  .object({
    /** ビルドディレクトリ */
    dir: z.string().default('build'),
    /** ターゲットOS（省略時は実行中のプラットフォーム） */
    os: TargetOsSchema.optional(),
    /**
     * CPack ジェネレータ
     *
     * 例: ["ZIP", "WIX"]
     */
    cpackGenerator: z.array(z.string()).default([]),
  })
  .default({ dir: 'build', cpackGenerator: [] });

/**
 * 署名対象バイナリの探索設定
 */
const BinariesConfigSchema = z
  .object({
    /** ビルドディレクトリ配下の探索ルート */
    directories: z.array(z.string()).default(['bin', 'lib', 'libexec', 'share']),
    /** 除外する fnmatch パターン */
    exclude: z.array(z.string()).default(['*-test']),
  })
  .default({ directories: ['bin', 'lib', 'libexec', 'share'], exclude: ['*-test'] });

export const ConfigSchema = z.object({
  /** 設定のプロジェクト種別フィルタ（例: "cxx"） */
  project: z.string().optional(),
  /** 初期化プロンプトのデフォルト値オーバーライド */
  defaults: SettingOverridesSchema.default({}),
  changelog: ChangelogConfigSchema,
  release: ReleaseConfigSchema,
  hosting: z
    .object({
      github: GitHubConfigSchema,
    })
    .default({ github: { apiBaseUrl: 'https://api.github.com', tokenEnvName: 'GITHUB_TOKEN' } }),
  build: BuildConfigSchema,
  binaries: BinariesConfigSchema,
});

export type Config = z.infer<typeof ConfigSchema>;

/**
 * .flow/config.json 用の JSON スキーマ（入力側、デフォルトのあるキーは省略可）
 */
export function configJsonSchema() {
  return {
    ...z.toJSONSchema(ConfigSchema, { io: 'input' }),
    title: 'buildflow configuration',
    description: 'Repository configuration for buildflow (.flow/config.json)',
  };
}
export type GitHubConfig = Config['hosting']['github'];
export type SettingOverrides = Config['defaults'];

/**
 * ステップ実行時に参照するビルド設定
 */
export interface StepConfig {
  readonly os: TargetOs;
  readonly buildDir: string;
  readonly cpackGenerator: readonly string[];
  readonly binaries: Config['binaries'];
}

/**
 * 実行中のプラットフォームから TargetOs を決める
 */
export function detectTargetOs(platform: NodeJS.Platform = process.platform): TargetOs {
  switch (platform) {
    case 'win32':
      return 'windows';
    case 'darwin':
      return 'macos';
    default:
      return 'linux';
  }
}

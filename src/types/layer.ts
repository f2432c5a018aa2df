import { z } from 'zod';

/**
 * レイヤー記述ファイル（`<layer-dir>.json`）のファイル単位エントリ
 */
const FileEntrySchema = z.object({
  /** 出力先パスのテンプレート（`/` 区切り） */
  path: z.string().optional(),
  /** 有効化条件となる設定キー */
  when: z.string().optional(),
});

/**
 * レイヤー記述ファイルのスキーマ
 *
 * filelist のキーはホストOSに関わらず `/` 区切りのソースパス。
 */
export const LayerDescriptorSchema = z.object({
  when: z.string().optional(),
  filelist: z.record(z.string(), FileEntrySchema).default({}),
});

export type LayerFileEntry = z.infer<typeof FileEntrySchema>;
export type LayerDescriptor = z.infer<typeof LayerDescriptorSchema>;

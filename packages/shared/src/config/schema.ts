import { z } from 'zod';

export const DEFAULT_MODEL = 'gpt-3.5-turbo-16k';

export const ProviderConfigSchema = z
  .object({
    /** Environment variable holding the API credential */
    apiKeyEnv: z.string().min(1).default('OPENAI_API_KEY'),
    baseUrl: z.string().url().optional(),
  })
  .strict();

export const DirdigestConfigSchema = z
  .object({
    root: z.string().min(1).default('.'),
    llmContext: z.boolean().default(false),
    maxFiles: z.number().int().positive().default(100),
    respectGitignore: z.boolean().default(true),
    batchDelaySeconds: z.number().min(0).default(5.0),
    /** When set, the model prompt is skipped */
    model: z.string().min(1).optional(),
    defaultModel: z.string().min(1).default(DEFAULT_MODEL),
    outputDir: z.string().min(1).default('.'),
    treeFile: z.string().min(1).default('directory_tree.txt'),
    digestFile: z.string().min(1).default('llmcontext.txt'),
    /** JSON array of extensions replacing the bundled text allow-list */
    textExtensionsFile: z.string().min(1).optional(),
    provider: ProviderConfigSchema.default({ apiKeyEnv: 'OPENAI_API_KEY' }),
  })
  .strict();

export type ProviderConfig = z.infer<typeof ProviderConfigSchema>;
export type DirdigestConfig = z.infer<typeof DirdigestConfigSchema>;
export type DirdigestConfigInput = z.input<typeof DirdigestConfigSchema>;

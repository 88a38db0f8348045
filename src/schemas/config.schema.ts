import { z } from 'zod';
import {
  DEFAULT_CONVERTER_ARGS,
  DEFAULT_CONVERTER_COMMAND,
  DEFAULT_RENDERER_ARGS,
  DEFAULT_RENDERER_COMMAND,
  DEFAULT_RENDERER_WARNING_ARGS,
} from '../constants.js';

// ============================================================================
// Converter Configuration
// ============================================================================

/** How README text is turned into troff */
export const converterStrategySchema = z.enum(['command', 'template']);

export const converterConfigSchema = z
  .object({
    /** External AI command, or the built-in template converter */
    strategy: converterStrategySchema.default('command'),
    /** Executable run for the command strategy */
    command: z.string().min(1).default(DEFAULT_CONVERTER_COMMAND),
    /** Arguments placed before the prompt */
    args: z.array(z.string()).default(DEFAULT_CONVERTER_ARGS),
  })
  .default({});

// ============================================================================
// Renderer / Install / Validation
// ============================================================================

export const rendererConfigSchema = z
  .object({
    command: z.string().min(1).default(DEFAULT_RENDERER_COMMAND),
    args: z.array(z.string()).default(DEFAULT_RENDERER_ARGS),
    warningArgs: z.array(z.string()).default(DEFAULT_RENDERER_WARNING_ARGS),
  })
  .default({});

export const installConfigSchema = z
  .object({
    systemDir: z.string().min(1).optional(),
    userDir: z.string().min(1).optional(),
  })
  .default({});

export const validationConfigSchema = z
  .object({
    /** Render generated pages before writing them */
    renderCheck: z.boolean().default(false),
  })
  .default({});

export const manpageConfigSchema = z
  .object({
    converter: converterConfigSchema,
    renderer: rendererConfigSchema,
    install: installConfigSchema,
    validation: validationConfigSchema,
  })
  .strict();

export type ManpageConfig = z.output<typeof manpageConfigSchema>;
export type ConverterStrategy = z.infer<typeof converterStrategySchema>;

export const defaultConfig: ManpageConfig = manpageConfigSchema.parse({});

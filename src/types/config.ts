/**
 * Configuration type definitions with Zod schemas
 */

import { z } from "zod";

// Zod schemas
export const MarkerPairSchema = z.object({
  start: z.string().min(1),
  end: z.string().min(1),
});

export const MarkersConfigSchema = z.object({
  header: MarkerPairSchema,
  config: MarkerPairSchema,
  thumbnail: MarkerPairSchema,
  executable: MarkerPairSchema,
});

export const TriggersConfigSchema = z.object({
  filamentStart: z.string().min(1),
  filamentEnd: z.string().min(1),
});

export const SubroutinesConfigSchema = z.object({
  enabled: z.boolean(),
  // Lines inserted after the filament start/end triggers
  start: z.string().min(1),
  end: z.string().min(1),
});

export const BackupConfigSchema = z.object({
  enabled: z.boolean(),
  suffix: z.string().min(1),
});

export const LoggingConfigSchema = z.object({
  level: z.enum(["debug", "info", "warn", "error"]),
});

export const ConversionConfigSchema = z.object({
  markers: MarkersConfigSchema,
  triggers: TriggersConfigSchema,
  subroutines: SubroutinesConfigSchema,
  backup: BackupConfigSchema,
  logging: LoggingConfigSchema,
});

// Partial schema for user/custom configs (top-level AND nested properties optional)
export const PartialConversionConfigSchema = ConversionConfigSchema.partial()
  .extend({
    markers: MarkersConfigSchema.partial().optional(),
    triggers: TriggersConfigSchema.partial().optional(),
    subroutines: SubroutinesConfigSchema.partial().optional(),
    backup: BackupConfigSchema.partial().optional(),
    logging: LoggingConfigSchema.partial().optional(),
  });

// Infer TypeScript types from Zod schemas
export type MarkerPair = z.infer<typeof MarkerPairSchema>;
export type MarkersConfig = z.infer<typeof MarkersConfigSchema>;
export type TriggersConfig = z.infer<typeof TriggersConfigSchema>;
export type SubroutinesConfig = z.infer<typeof SubroutinesConfigSchema>;
export type BackupConfig = z.infer<typeof BackupConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
export type ConversionConfig = z.infer<typeof ConversionConfigSchema>;
export type PartialConversionConfig = z.infer<
  typeof PartialConversionConfigSchema
>;

export interface ConfigError {
  path: string;
  error: unknown;
}

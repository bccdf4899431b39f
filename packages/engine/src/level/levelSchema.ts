import { z } from "zod";

export const LevelActionSchema = z
  .object({
    floor: z.number().int().nonnegative(),
    eventType: z.string().min(1),
  })
  .passthrough();

export const LevelSettingsSchema = z
  .object({
    bpm: z.number().positive().default(100),
  })
  .passthrough();

export const LevelDataSchema = z
  .object({
    angleData: z.array(z.number()).optional(),
    pathData: z.string().optional(),
    settings: LevelSettingsSchema.default({}),
    actions: z.array(LevelActionSchema).default([]),
  })
  .passthrough()
  .refine((level) => level.angleData !== undefined || level.pathData !== undefined, {
    message: "level must contain angleData or pathData",
    path: ["angleData"],
  });

export type LevelAction = z.infer<typeof LevelActionSchema>;
export type LevelSettings = z.infer<typeof LevelSettingsSchema>;
export type LevelData = z.infer<typeof LevelDataSchema>;

export class LevelFormatError extends Error {
  readonly code = "TC_ERR_LEVEL_FORMAT";

  constructor(message: string) {
    super(message);
    this.name = "LevelFormatError";
  }
}

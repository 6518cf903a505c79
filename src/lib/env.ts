import { z } from "zod";

const envSchema = z.object({
  TAKVIMI_PDF_DIR: z.string().min(1).default("takvimi-pdf"),
  TAKVIMI_JSON_DIR: z.string().min(1).default("api/takvimi"),
  TAKVIMI_FRONT_MATTER_OFFSET: z.coerce.number().int().min(0).default(7)
});

export type Env = z.infer<typeof envSchema>;

function getRawEnv(): Record<string, string | undefined> {
  return {
    TAKVIMI_PDF_DIR: process.env.TAKVIMI_PDF_DIR || undefined,
    TAKVIMI_JSON_DIR: process.env.TAKVIMI_JSON_DIR || undefined,
    TAKVIMI_FRONT_MATTER_OFFSET: process.env.TAKVIMI_FRONT_MATTER_OFFSET || undefined
  };
}

export function getEnv(): Env {
  const parsed = envSchema.safeParse(getRawEnv());
  if (!parsed.success) {
    const message = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ");
    throw new Error(`Missing/invalid environment variables: ${message}`);
  }
  return parsed.data;
}

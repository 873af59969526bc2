import { z } from 'zod';

const serviceAccountSchema = z.object({
  project_id: z.string(),
  client_email: z.string(),
  private_key: z.string(),
});

export type ServiceAccountKey = z.infer<typeof serviceAccountSchema>;

/**
 * Parses the FIREBASE_SERVICE_ACCOUNT JSON. Returns null when unset and
 * throws when set but unusable.
 */
export function parseServiceAccount(raw: string | undefined): ServiceAccountKey | null {
  if (!raw) {
    return null;
  }
  const parsed = serviceAccountSchema.safeParse(JSON.parse(raw));
  if (!parsed.success) {
    throw new Error('Invalid FIREBASE_SERVICE_ACCOUNT JSON');
  }
  return parsed.data;
}

import { z } from "zod";

export const CREDENTIALS_REQUIRED_MESSAGE = "Username and Password are required.";

const credentialsSchema = z.object({
  username: z.string().trim().min(1),
  password: z.string().min(1),
});

export type Credentials = z.infer<typeof credentialsSchema>;

export type CredentialsCheck =
  | { ok: true; credentials: Credentials }
  | { ok: false; message: string };

/** Checked before any request is made; the username comes back trimmed. */
export function validateCredentials(username: string, password: string): CredentialsCheck {
  const parsed = credentialsSchema.safeParse({ username, password });
  if (!parsed.success) return { ok: false, message: CREDENTIALS_REQUIRED_MESSAGE };
  return { ok: true, credentials: parsed.data };
}

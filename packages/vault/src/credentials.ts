import { z } from "zod";

/**
 * Secret material needed to authenticate against a remote gateway's
 * control API. Lives decrypted only for the duration of one outbound call.
 */
export const GatewayCredentialsSchema = z.object({
  username: z.string().min(1),
  password: z.string(),
  token: z.string().optional(),
});

export type GatewayCredentials = z.infer<typeof GatewayCredentialsSchema>;

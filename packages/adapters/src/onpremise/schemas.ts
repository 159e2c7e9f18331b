import { z } from "zod";

/**
 * Response bodies of the on-premise gateway control API. Fields the
 * control plane does not read are ignored; absent and null are equivalent.
 */

export const ProviderMutationResponseSchema = z.object({
  id: z.string().nullish(),
  status: z.string().nullish(),
});

export const ProviderDetailResponseSchema = z.object({
  provider: z
    .object({
      id: z.string().nullish(),
      configuration: z
        .object({
          kind: z.string().nullish(),
          metadata: z.object({ name: z.string().nullish() }).nullish(),
          spec: z.record(z.unknown()).nullish(),
        })
        .nullish(),
      deploymentStatus: z.string().nullish(),
      metadata: z.object({ deployedAt: z.coerce.date().nullish() }).nullish(),
    })
    .nullish(),
});

export const ProviderListResponseSchema = z.object({
  providers: z
    .array(
      z.object({
        id: z.string().nullish(),
        displayName: z.string().nullish(),
        template: z.string().nullish(),
        status: z.string().nullish(),
        createdAt: z.coerce.date().nullish(),
      }),
    )
    .nullish(),
});

export const PolicyListResponseSchema = z.object({
  policies: z
    .array(
      z.object({
        name: z.string(),
        description: z.string().nullish(),
        parameters: z.record(z.unknown()).nullish(),
      }),
    )
    .nullish(),
});

export const OnPremiseParametersSchema = z.object({
  requestTimeoutMs: z.number().int().positive().default(30_000),
  healthCheckTimeoutMs: z.number().int().positive().default(5_000),
});

export type OnPremiseParameters = z.infer<typeof OnPremiseParametersSchema>;

import { z } from 'zod';

export const ChannelType = z.enum(['EMAIL', 'SLACK', 'WEBHOOK']);
export type ChannelType = z.infer<typeof ChannelType>;

export const WebhookMethod = z.enum(['POST', 'PUT', 'PATCH']);
export type WebhookMethod = z.infer<typeof WebhookMethod>;

export const EmailChannelConfigSchema = z.object({
  type: z.literal('EMAIL'),
  recipients: z.array(z.string().email()).default([]),
});

export const SlackChannelConfigSchema = z.object({
  type: z.literal('SLACK'),
  webhookUrl: z.string().url().optional(),
});

export const WebhookChannelConfigSchema = z.object({
  type: z.literal('WEBHOOK'),
  url: z.string().url().optional(),
  method: WebhookMethod.default('POST'),
  /** Custom headers as a JSON object string, kept raw so a bad value degrades instead of failing */
  headers: z.string().optional(),
  /** Overrides notification.webhook.retryOnFailure for this channel */
  retryOnFailure: z.boolean().optional(),
});

export const ChannelConfigSchema = z.discriminatedUnion('type', [
  EmailChannelConfigSchema,
  SlackChannelConfigSchema,
  WebhookChannelConfigSchema,
]);

export type EmailChannelConfig = z.infer<typeof EmailChannelConfigSchema>;
export type SlackChannelConfig = z.infer<typeof SlackChannelConfigSchema>;
export type WebhookChannelConfig = z.infer<typeof WebhookChannelConfigSchema>;
export type ChannelConfig = z.infer<typeof ChannelConfigSchema>;

export const NotificationChannelSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  type: ChannelType,
  enabled: z.boolean().default(true),
  configuration: ChannelConfigSchema,
  successCount: z.number().int().nonnegative().default(0),
  failureCount: z.number().int().nonnegative().default(0),
  lastSuccessAt: z.string().datetime().optional(),
  lastFailureAt: z.string().datetime().optional(),
  createdAt: z.string().datetime(),
  updatedAt: z.string().datetime(),
});

export type NotificationChannel = z.infer<typeof NotificationChannelSchema>;

function isStringMap(raw: string): boolean {
  try {
    return z.record(z.string()).safeParse(JSON.parse(raw)).success;
  } catch {
    return false;
  }
}

// Headers are checked here, at configuration time. Already-stored channels
// are not re-validated; the webhook driver falls back to no headers instead.
export const CreateChannelInputSchema = z
  .object({
    name: z.string().min(1),
    enabled: z.boolean().default(true),
    configuration: ChannelConfigSchema,
  })
  .superRefine((input, ctx) => {
    const cfg = input.configuration;
    if (cfg.type === 'WEBHOOK' && cfg.headers !== undefined && !isStringMap(cfg.headers)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['configuration', 'headers'],
        message: 'Headers must be a JSON object of string values',
      });
    }
  })
  .transform((input) => ({ ...input, type: input.configuration.type }));

export type CreateChannelInput = z.input<typeof CreateChannelInputSchema>;

'use strict';

import { z } from 'zod';

import { VapidKeys } from './vapid-keys.js';
import { WebPush } from './web-push-lib.js';
import { FetchWebPushService, type FetchWebPushServiceOptions } from './web-push-service.js';
import { WebPushError } from './web-push-error.js';

// An empty variable counts as unset.
const blankAsUnset = (value: unknown) => (value === '' ? undefined : value);

const optionalInteger = z.preprocess(blankAsUnset, z.coerce.number().int().nonnegative().optional());
const optionalPositiveInteger = z.preprocess(
  blankAsUnset,
  z.coerce.number().int().positive().optional()
);

export const webPushConfigSchema = z.object({
  VAPID_SUBJECT: z.string().min(1, 'VAPID_SUBJECT is required'),
  VAPID_PUBLIC_KEY: z.string().min(1, 'VAPID_PUBLIC_KEY is required'),
  VAPID_PRIVATE_KEY: z.string().min(1, 'VAPID_PRIVATE_KEY is required'),
  VAPID_EXPIRATION_SECONDS: optionalPositiveInteger,
  WEB_PUSH_DEFAULT_TTL: optionalInteger,
  WEB_PUSH_TIMEOUT_MS: optionalPositiveInteger,
});

export interface WebPushConfig {
  subject: string;
  publicKey: string;
  privateKey: string;
  expirationSeconds?: number;
  defaultTtl?: number;
  timeout?: number;
}

type Env = Record<string, string | undefined>;

export function loadWebPushConfig(env: Env = process.env): WebPushConfig {
  const parsed = webPushConfigSchema.safeParse(env);
  if (!parsed.success) {
    throw new WebPushError(
      'Invalid web push configuration: ' +
        parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join(', ')
    );
  }

  return {
    subject: parsed.data.VAPID_SUBJECT,
    publicKey: parsed.data.VAPID_PUBLIC_KEY,
    privateKey: parsed.data.VAPID_PRIVATE_KEY,
    expirationSeconds: parsed.data.VAPID_EXPIRATION_SECONDS,
    defaultTtl: parsed.data.WEB_PUSH_DEFAULT_TTL,
    timeout: parsed.data.WEB_PUSH_TIMEOUT_MS,
  };
}

function createWebPush(config: WebPushConfig): WebPush {
  return new WebPush({
    subject: config.subject,
    vapidKeys: VapidKeys.fromBase64Url(config.publicKey, config.privateKey),
    expirationSeconds: config.expirationSeconds,
    defaultTtl: config.defaultTtl,
  });
}

export function createWebPushFromEnv(env: Env = process.env): WebPush {
  return createWebPush(loadWebPushConfig(env));
}

export function createWebPushServiceFromEnv(
  env: Env = process.env,
  options: Omit<FetchWebPushServiceOptions, 'timeout'> = {}
): FetchWebPushService {
  const config = loadWebPushConfig(env);

  return new FetchWebPushService(createWebPush(config), {
    ...options,
    timeout: config.timeout,
  });
}

'use strict';

export { VapidKeys, generateVAPIDKeys } from './vapid-keys.js';
export { createSubscriberKeys } from './subscriber-keys.js';
export type { SubscriberKeys, SubscriberKeysInit } from './subscriber-keys.js';
export {
  createVapidAssertion,
  getVapidHeaders,
  getFutureExpirationTimestamp,
  validateSubject,
} from './vapid-helper.js';
export type { VapidAssertion, VapidAssertionOptions } from './vapid-helper.js';
export { encrypt } from './encryption-helper.js';
export type { EncryptedBody, EncryptOptions } from './encryption-helper.js';
export { decrypt, getMaxPayloadLength } from './ece.js';
export type { ReceiverKeys } from './ece.js';
export {
  createNotification,
  createNotificationFromSubscription,
  pushSubscriptionSchema,
} from './notification.js';
export type {
  Notification,
  NotificationInit,
  NotificationOptions,
  PushSubscriptionJSON,
} from './notification.js';
export { SubscriptionState, getSubscriptionState } from './subscription-state.js';
export { WebPush } from './web-push-lib.js';
export type { WebPushOptions, WebPushRequest } from './web-push-lib.js';
export { WebPushService, FetchWebPushService } from './web-push-service.js';
export type {
  FetchFunction,
  FetchWebPushServiceOptions,
  WebPushLogger,
} from './web-push-service.js';
export {
  createWebPushFromEnv,
  createWebPushServiceFromEnv,
  loadWebPushConfig,
} from './config.js';
export type { WebPushConfig } from './config.js';
export {
  DEFAULT_EXPIRATION_SECONDS,
  DEFAULT_TTL,
  MAX_EXPIRATION_SECONDS,
  RECORD_SIZE,
  supportedContentEncodings,
  supportedUrgencies,
} from './web-push-constants.js';
export type { ContentEncoding, Urgency } from './web-push-constants.js';
export {
  InvalidNotificationError,
  InvalidSubjectError,
  InvalidVapidKeyError,
  KeyAgreementError,
  PayloadTooLargeError,
  UnexpectedStatusError,
  WebPushError,
  WebPushTransportError,
} from './web-push-error.js';

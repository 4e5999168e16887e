export const WebhookDeps = {
  PushQueueService: Symbol.for('PushQueueService'),
  PushQueueOptions: Symbol.for('PushQueueOptions'),
  WebhookRoute: Symbol.for('WebhookRoute'),
};

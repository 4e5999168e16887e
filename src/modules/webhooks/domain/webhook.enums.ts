export enum SignatureSchemes {
  // `{id}.{timestamp}.{payload}` signed, with a freshness window
  Timestamped = 'timestamped',
  // raw payload signed, optional `sha256=` prefix
  Plain = 'plain',
  Unsigned = 'unsigned',
}

export enum WebhookEndpoints {
  IncidentIo = 'incident-io',
  Generic = 'generic',
}

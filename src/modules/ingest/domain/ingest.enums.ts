export enum IngestOutcomes {
  Emitted = 'emitted',
  Dropped = 'dropped',
  Error = 'error',
}

// Logged under the `failure` field so each kind can be filtered on its own.
export enum IngestFailures {
  Verification = 'verification',
  MalformedPayload = 'malformed_payload',
  Normalization = 'normalization',
  Transport = 'transport',
  Unexpected = 'unexpected',
}

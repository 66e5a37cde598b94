export interface AwsOptions {
  /** Value of the `anthropic_version` body field */
  anthropicVersion: string
  /** `max_tokens` sent when the request sets none */
  defaultMaxTokens: number
  /** `stop_reason` used when a response carries none */
  defaultStopReason: string
}

export const DEFAULT_AWS_OPTIONS: AwsOptions = {
  anthropicVersion: 'bedrock-2023-05-31',
  defaultMaxTokens: 4096,
  defaultStopReason: 'stop_sequence',
}

import { BedrockRuntimeClient, ConverseCommand } from '@aws-sdk/client-bedrock-runtime';

export interface ConverseRequest {
  system?: string;
  prompt: string;
  maxTokens?: number;
}

/** Minimal text-in/text-out surface over a chat model. */
export interface ConverseClient {
  readonly modelId: string;
  converse(request: ConverseRequest): Promise<string>;
}

export interface BedrockConverseOptions {
  region: string;
  modelId: string;
  client?: BedrockRuntimeClient;
}

export class BedrockConverseClient implements ConverseClient {
  readonly modelId: string;
  private readonly client: BedrockRuntimeClient;

  constructor(options: BedrockConverseOptions) {
    this.modelId = options.modelId;
    this.client = options.client ?? new BedrockRuntimeClient({ region: options.region });
  }

  async converse(request: ConverseRequest): Promise<string> {
    const command = new ConverseCommand({
      modelId: this.modelId,
      messages: [{ role: 'user', content: [{ text: request.prompt }] }],
      ...(request.system ? { system: [{ text: request.system }] } : {}),
      inferenceConfig: { maxTokens: request.maxTokens ?? 2048, temperature: 0.1 },
    });

    const response = await this.client.send(command);
    const text = (response.output?.message?.content ?? [])
      .map((block) => block.text ?? '')
      .join('')
      .trim();
    if (!text) {
      throw new Error(`Model returned no text (stopReason: ${response.stopReason ?? 'unknown'})`);
    }
    return text;
  }
}

/**
 * Strip a surrounding markdown code fence (```json ... ```) and parse the
 * remainder as JSON.
 */
export function parseModelJson(text: string): unknown {
  let cleaned = text.trim();
  if (cleaned.startsWith('```json')) cleaned = cleaned.slice(7);
  else if (cleaned.startsWith('```')) cleaned = cleaned.slice(3);
  if (cleaned.endsWith('```')) cleaned = cleaned.slice(0, -3);
  return JSON.parse(cleaned.trim());
}

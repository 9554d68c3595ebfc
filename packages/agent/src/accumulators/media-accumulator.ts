import type {
  ChatMessage,
  DataPart,
  FinishReason,
  LinkPart,
  MediaGenerationResult,
  Usage,
} from '@chorus/llm';

export class MediaResponseAccumulator {
  private readonly assets: Array<DataPart> = [];
  private readonly links: Array<LinkPart> = [];
  private readonly messages: Array<ChatMessage> = [];
  private metadata: Record<string, unknown> = {};
  private id = '';
  private finishReason: FinishReason = 'unspecified';
  private usage: Usage | null = null;

  add(chunk: MediaGenerationResult): void {
    this.assets.push(...chunk.assets);
    this.links.push(...chunk.links);
    this.messages.push(...chunk.messages);
    this.metadata = { ...this.metadata, ...chunk.metadata };

    if (chunk.id.length > 0) {
      this.id = chunk.id;
    }
    if (chunk.finishReason !== 'unspecified') {
      this.finishReason = chunk.finishReason;
    }
    if (chunk.usage !== null) {
      this.usage = chunk.usage;
    }
  }

  buildFinal(): MediaGenerationResult {
    return {
      id: this.id,
      assets: [...this.assets],
      links: [...this.links],
      messages: [...this.messages],
      finishReason: this.finishReason,
      metadata: { ...this.metadata },
      usage: this.usage,
    };
  }
}

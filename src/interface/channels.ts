export interface ChannelAdapter {
  name: string;
  /**
   * Delivers one message to one chat target; rejects when the channel refuses
   * it, or when `signal` aborts before it went out.
   */
  sendMessage(target: string, text: string, signal?: AbortSignal): Promise<void>;
}

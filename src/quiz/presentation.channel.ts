import type { ChannelKey } from './session';

export const PRESENTATION_CHANNEL = Symbol('PRESENTATION_CHANNEL');

export interface MessageHandle {
  channelKey: ChannelKey;
  messageId: number;
}

/**
 * Where quiz messages go. Implementations retry transient failures themselves
 * and reject with `PresentationError` once they give up.
 */
export interface PresentationChannel {
  send(channelKey: ChannelKey, content: string): Promise<MessageHandle>;
  edit(handle: MessageHandle, content: string): Promise<void>;
}

export type Channel = 'email' | 'chat' | 'social';

export interface InboundMessage {
  channel: Channel;
  /** Unique within the channel */
  externalId: string;
  sender: string;
  body: string;
  receivedAt: Date;
  /** What the channel needs in order to reply (email id, chat id, comment id) */
  threadRef: string;
}

export interface Checkpoint {
  channel: Channel;
  lastReceivedAt: number;
  lastExternalId: string | null;
  updatedAt: number;
}

export type PushHandler = (message: InboundMessage) => Promise<void>;

export interface ChannelPort {
  readonly channel: Channel;
  /** False for push-only channels; the supervisor never schedules them. */
  readonly pollable: boolean;
  fetchNew(checkpoint: Checkpoint): Promise<InboundMessage[]>;
  sendReply(threadRef: string, text: string): Promise<void>;
  onPush?(handler: PushHandler): void;
}

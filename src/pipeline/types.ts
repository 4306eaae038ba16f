export type MediaKind =
  | "Photo"
  | "Video"
  | "Audio"
  | "Voice message"
  | "Document"
  | "Poll"
  | "Location"
  | "Media";

export type CollectedMessage = {
  readonly text: string;
  readonly senderName: string;
  readonly timestamp: Date;
  readonly permalink: string;
  readonly channelName: string;
  readonly hasMedia: boolean;
  readonly mediaKind: MediaKind | null;
};

/** Channel display name to its messages, oldest first, in configuration order. */
export type MessagesByChannel = ReadonlyMap<
  string,
  ReadonlyArray<CollectedMessage>
>;

/** Channel display name to synopsis text or a failure marker. */
export type ChannelSummaries = ReadonlyMap<string, string>;

// ---------- source transport ----------

export type SourceMessage = {
  readonly id: number;
  readonly date: Date;
  readonly text: string;
  readonly mediaKind: MediaKind | null;
  readonly resolveSenderName: () => Promise<string>;
};

export type IterMessagesOptions = {
  readonly limit: number;
  readonly offsetDate: Date;
};

/** A resolved, addressable channel. Messages stream newest first. */
export type SourceChannel = {
  readonly id: string;
  readonly username: string | null;
  readonly iterMessages: (
    options: IterMessagesOptions,
  ) => AsyncIterable<SourceMessage>;
};

export type SourceClient = {
  readonly connect: () => Promise<void>;
  readonly disconnect: () => Promise<void>;
  /** Lists joined dialogs so later lookups hit the entity cache. */
  readonly listDialogs: () => Promise<number>;
  readonly resolveChannel: (channelId: string) => Promise<SourceChannel>;
};

export type UserId = number;
export type ChatId = number;

export interface ChatRef {
  chatId: ChatId;
  title: string;
}

export interface UserProfile {
  firstName?: string;
  username?: string;
}

export interface ForwardSettings {
  hideHeader: boolean;
  forwardMedia: boolean;
  urlPreviews: boolean;
  removeUsernames: boolean;
  removeLinks: boolean;
  /** Whether a media caption counts as the message text */
  captionForward: boolean;
  /** Pause between two targets of one message */
  delaySeconds: number;
  maxMessageLength: number;
}

export type ToggleableSetting = Exclude<keyof ForwardSettings, 'maxMessageLength' | 'delaySeconds'>;

export interface ForwardingState {
  enabled: boolean;
  totalForwarded: number;
  lastForwardedAt?: Date;
}

export interface Replacement {
  original: string;
  replacement: string;
}

export type KeywordList = 'blacklist' | 'whitelist';

export type ReplacementTable = 'username' | 'link';

/**
 * Immutable per-user configuration snapshot held by the registry
 */
export interface UserConfiguration {
  readonly userId: UserId;
  readonly profile: Readonly<UserProfile>;
  readonly sources: readonly Readonly<ChatRef>[];
  readonly targets: readonly Readonly<ChatRef>[];
  readonly settings: Readonly<ForwardSettings>;
  readonly forwarding: Readonly<ForwardingState>;
  readonly blacklist: readonly string[];
  readonly whitelist: readonly string[];
  readonly usernameReplacements: readonly Readonly<Replacement>[];
  readonly linkReplacements: readonly Readonly<Replacement>[];
}

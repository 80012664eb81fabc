export interface ChatUser {
  username?: string | null;
  displayName?: string | null;
}

export interface ChatDocument {
  fileName: string;
  mimeType: string;
  content: Uint8Array;
}

export type ChatEvent =
  | { kind: "command"; sessionId: string; command: string; args: string[]; user?: ChatUser }
  | { kind: "text"; sessionId: string; text: string; user?: ChatUser }
  | { kind: "document"; sessionId: string; document: ChatDocument; user?: ChatUser };

export interface ChatAction {
  label: string;
  command: string;
}

export interface ChatAttachment {
  fileName: string;
  mimeType: string;
  content: Uint8Array;
}

export interface ChatReply {
  sessionId: string;
  text: string;
  actions?: ChatAction[];
  attachment?: ChatAttachment;
}

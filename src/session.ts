import type { ChatMessage, ProviderKind, SessionSnapshot } from './types.js';
import { newSessionId, nowIso } from './utils.js';

/** A mutation was attempted while a turn holds the session. */
export class SessionBusyError extends Error {
  constructor(operation: string) {
    super(`cannot ${operation} while a turn is in progress`);
    this.name = 'SessionBusyError';
  }
}

/**
 * Exclusive right to append one turn's messages. commit() appends and ends
 * the lease; release() ends it without appending. Both are idempotent after
 * the first call.
 */
export type TurnLease = {
  commit(messages: readonly ChatMessage[]): void;
  release(): void;
};

export type SessionInit = {
  provider: ProviderKind;
  model: string;
  systemInstruction?: string;
};

/**
 * The transcript plus the settings it was produced under.
 * Messages are only ever appended; clear() and restore() replace the whole list.
 */
export class ConversationSession {
  private _id: string;
  private _provider: ProviderKind;
  private _model: string;
  private _systemInstruction?: string;
  private _createdAt: string;
  private _updatedAt: string;
  private _messages: ChatMessage[] = [];
  private lease?: object;

  constructor(init: SessionInit) {
    this._id = newSessionId();
    this._provider = init.provider;
    this._model = init.model;
    this._systemInstruction = init.systemInstruction || undefined;
    this._createdAt = nowIso();
    this._updatedAt = this._createdAt;
  }

  static fromSnapshot(snap: SessionSnapshot): ConversationSession {
    const s = new ConversationSession({
      provider: snap.provider,
      model: snap.model,
      systemInstruction: snap.system_instruction,
    });
    s.install(snap);
    return s;
  }

  get id(): string {
    return this._id;
  }
  get provider(): ProviderKind {
    return this._provider;
  }
  get model(): string {
    return this._model;
  }
  get systemInstruction(): string | undefined {
    return this._systemInstruction;
  }
  get createdAt(): string {
    return this._createdAt;
  }
  get updatedAt(): string {
    return this._updatedAt;
  }
  get messages(): readonly ChatMessage[] {
    return this._messages;
  }
  get busy(): boolean {
    return this.lease !== undefined;
  }

  /** Throws SessionBusyError when a turn holds the session. */
  assertIdle(operation: string): void {
    if (this.lease) throw new SessionBusyError(operation);
  }

  beginTurn(): TurnLease {
    this.assertIdle('start a turn');
    const token = {};
    this.lease = token;
    const end = () => {
      if (this.lease === token) this.lease = undefined;
    };
    return {
      commit: (messages) => {
        if (this.lease !== token) return;
        if (messages.length) {
          this._messages = [...this._messages, ...messages];
          this.touch();
        }
        end();
      },
      release: end,
    };
  }

  clear(): void {
    this.assertIdle('clear the session');
    this._messages = [];
    this.touch();
  }

  setModel(model: string): void {
    this.assertIdle('change the model');
    this._model = model;
    this.touch();
  }

  setProvider(provider: ProviderKind, model: string): void {
    this.assertIdle('change the provider');
    this._provider = provider;
    this._model = model;
    this.touch();
  }

  setSystemInstruction(text: string | undefined): void {
    this.assertIdle('change the system instruction');
    this._systemInstruction = text || undefined;
    this.touch();
  }

  /** Replace identity, settings and transcript with a loaded snapshot. */
  restore(snap: SessionSnapshot): void {
    this.assertIdle('load a session');
    this.install(snap);
  }

  snapshot(): SessionSnapshot {
    return {
      id: this._id,
      provider: this._provider,
      model: this._model,
      ...(this._systemInstruction !== undefined && { system_instruction: this._systemInstruction }),
      created_at: this._createdAt,
      updated_at: this._updatedAt,
      messages: this._messages.map(cloneMessage),
    };
  }

  private install(snap: SessionSnapshot): void {
    this._id = snap.id;
    this._provider = snap.provider;
    this._model = snap.model;
    this._systemInstruction = snap.system_instruction;
    this._createdAt = snap.created_at;
    this._updatedAt = snap.updated_at;
    this._messages = snap.messages.map(cloneMessage);
  }

  private touch(): void {
    this._updatedAt = nowIso();
  }
}

function cloneMessage(m: ChatMessage): ChatMessage {
  switch (m.role) {
    case 'assistant':
      return m.tool_calls
        ? { ...m, tool_calls: m.tool_calls.map((c) => ({ ...c, arguments: structuredClone(c.arguments) })) }
        : { ...m };
    case 'tool':
      return { ...m, content: { ...m.content } };
    default:
      return { ...m };
  }
}

import type { CallOptions } from '../../src/timeout.js';
import type { Conversation, ConversationSpec, Toolformer } from '../../src/backend/types.js';

export type Script = (message: string, turn: number) => string | Promise<string>;

export class ScriptedConversation implements Conversation {
  readonly received: string[] = [];

  constructor(
    readonly spec: ConversationSpec,
    private readonly script: Script,
  ) {}

  async chat(message: string, _options?: CallOptions): Promise<string> {
    this.received.push(message);
    return await this.script(message, this.received.length - 1);
  }
}

/** Backend stand-in whose replies come from a script instead of a model. */
export class ScriptedToolformer implements Toolformer {
  readonly name = 'scripted';
  readonly conversations: ScriptedConversation[] = [];

  constructor(private readonly script: Script) {}

  newConversation(spec: ConversationSpec): ScriptedConversation {
    const conversation = new ScriptedConversation(spec, this.script);
    this.conversations.push(conversation);
    return conversation;
  }
}

/** Replies in order; the last reply repeats once the list runs out. */
export function inOrder(...replies: string[]): Script {
  return (_message, turn) => replies[Math.min(turn, replies.length - 1)];
}

export const DOUBLE_IT_BLOCK = `<FINALPROTOCOL>
---
name: DoubleIt
description: Doubles a number.
multiround: false
---

The sender sends the number x as a decimal string. The receiver replies with 2 * x as a decimal string.
</FINALPROTOCOL>`;

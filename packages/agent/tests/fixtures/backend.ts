import type { Conversation, ConversationSpec, Toolformer } from '@pactwire/core';

export type Role = 'sender' | 'receiver' | 'programmer' | 'checker';

export type Script = (message: string, turn: number) => string;

function roleOf(spec: ConversationSpec): Role {
  switch (spec.category) {
    case 'programming': {
      return 'programmer';
    }
    case 'protocolChecking': {
      return 'checker';
    }
    default: {
      return spec.prompt.includes('on behalf of a service') ? 'receiver' : 'sender';
    }
  }
}

/** One backend for every role in the process; each role answers from its own script. */
export class RoleToolformer implements Toolformer {
  readonly name = 'roles';
  readonly opened: { role: Role; spec: ConversationSpec }[] = [];

  constructor(private readonly scripts: Partial<Record<Role, Script>>) {}

  newConversation(spec: ConversationSpec): Conversation {
    const role = roleOf(spec);
    this.opened.push({ role, spec });
    const script = this.scripts[role];
    let turn = 0;
    return {
      chat: async (message) => {
        if (!script) {
          throw new Error(`No script for ${role}`);
        }
        return script(message, turn++);
      },
    };
  }
}

export const DOUBLE_IT_DOCUMENT = `---
name: DoubleIt
description: Doubles a number.
multiround: false
---

Send x as a decimal string; the reply is 2 * x as a decimal string.`;

export const DOUBLE_IT_BLOCK = `<FINALPROTOCOL>\n${DOUBLE_IT_DOCUMENT}\n</FINALPROTOCOL>`;

export const DOUBLE_IT_ADAPTER = `export async function run(task_data) {
  return { y: Number(await send_to_server(String(task_data.x))) };
}`;

export const PROGRAMMER_REPLY = `<IMPLEMENTATION>
\`\`\`javascript
async function send_query(task_data) {
  return { y: Number(await send_to_server(String(task_data.x))) };
}
\`\`\`
</IMPLEMENTATION>`;

/** Sender proposes, receiver answers with the final protocol, sender repeats it back. */
export const agreeingScripts: Partial<Record<Role, Script>> = {
  sender: (message, turn) => (turn === 0 ? 'I propose sending x as a decimal string.' : `Agreed.\n${message}`),
  receiver: () => DOUBLE_IT_BLOCK,
  programmer: () => PROGRAMMER_REPLY,
  checker: () => 'The double tool covers it. YES',
};

export const TASK = {
  description: 'Double a number',
  input: { type: 'object', properties: { x: { type: 'number' } } },
  output: { type: 'object', properties: { y: { type: 'number' } } },
};

export const TOOLS = [
  {
    name: 'double',
    description: 'Doubles a number',
    parameters: [{ name: 'x', description: 'Input', type: 'number', required: true }],
  },
];

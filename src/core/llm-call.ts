/**
 * Model call construction and constrained-choice resolution
 */

import { PLACEHOLDER_REGEX_GLOBAL } from '../script/parser.js';
import type { ConstrainedChoice } from '../script/types.js';
import type { ChatMessage, Role } from '../types/llm.js';
import { messageText, textMessage } from '../types/llm.js';

export interface CurrentMessage {
  role: Role;
  content: string;
}

export interface CallMessages {
  messages: ChatMessage[];
  /** System-role history text, sent out of band */
  system?: string;
}

/**
 * Remove AI placeholder markup from message text
 */
export function stripPlaceholders(content: string): string {
  return content.replace(PLACEHOLDER_REGEX_GLOBAL, '').trim();
}

function isEmptyEntry(message: ChatMessage): boolean {
  return message.parts.every((part) => part.type === 'text' && part.text.trim() === '');
}

function hasFunctionResponse(message: ChatMessage): boolean {
  return message.parts.some((part) => part.type === 'function_response');
}

/**
 * History entries to send plus the current message.
 *
 * System-role and empty entries are dropped from the list (system text is
 * returned separately), only the newest `maxHistory` entries are kept, and
 * the window never opens on a tool result whose call was cut off.
 *
 * @throws Error when nothing is left to send
 */
export function buildCallMessages(
  history: ChatMessage[],
  current: CurrentMessage | null,
  maxHistory: number
): CallMessages {
  const system = history
    .filter((message) => message.role === 'system')
    .map(messageText)
    .filter((text) => text.trim() !== '')
    .join('\n\n');

  const conversational = history.filter(
    (message) => message.role !== 'system' && !isEmptyEntry(message)
  );
  const window = conversational.slice(-Math.max(1, maxHistory));
  while (window.length > 0 && window[0] !== undefined && hasFunctionResponse(window[0])) {
    window.shift();
  }

  const messages = [...window];
  if (current && current.role !== 'assistant') {
    const text = stripPlaceholders(current.content);
    if (text) {
      messages.push(textMessage(current.role === 'system' ? 'user' : current.role, text));
    }
  }

  if (messages.length === 0) {
    throw new Error('No messages to send to the model');
  }

  const result: CallMessages = { messages };
  if (system) result.system = system;
  return result;
}

// ============================================================
// CONSTRAINED CHOICE
// ============================================================

/**
 * Instruction appended to a prompt that carries a choice constraint
 */
export function choiceInstruction(choice: ConstrainedChoice): string {
  let text = `\n\nYou must choose from these options only: ${choice.options.join('|')}`;
  if (choice.count !== undefined && choice.count > 1) {
    text += `\nChoose exactly ${choice.count} options, separated by |.`;
  } else {
    text += '\nAnswer with the option only.';
  }
  return text;
}

/**
 * Canonical option named by a response: exact match first, then the first
 * option, in the order given, that the response contains
 */
export function matchOption(text: string, options: string[]): string | null {
  const normalized = text.trim().toLowerCase();
  const exact = options.find((option) => option.toLowerCase() === normalized);
  if (exact !== undefined) return exact;
  return options.find((option) => option !== '' && normalized.includes(option.toLowerCase())) ?? null;
}

/**
 * Map a raw response onto the allowed options
 */
export function applyChoice(text: string, choice: ConstrainedChoice): string {
  const { options } = choice;
  const single = options.length === 1 ? options[0] : undefined;
  if (single !== undefined) return single;

  if (choice.count !== undefined && choice.count > 1) {
    const picked: string[] = [];
    for (const token of text.split(/[|,\n]/)) {
      const option = matchOption(token, options);
      if (option !== null && !picked.includes(option)) {
        picked.push(option);
      }
    }
    if (picked.length > 0) {
      return picked.slice(0, choice.count).join(', ');
    }
  }

  return matchOption(text, options) ?? text.trim();
}

/**
 * Local pick for a `:random` constraint
 */
export function pickRandom(choice: ConstrainedChoice, random: () => number = Math.random): string {
  const pool = [...choice.options];
  const count = Math.min(Math.max(choice.count ?? 1, 1), pool.length);
  const picked: string[] = [];
  for (let i = 0; i < count; i++) {
    const index = Math.floor(random() * pool.length);
    const [option] = pool.splice(Math.min(index, pool.length - 1), 1);
    if (option !== undefined) picked.push(option);
  }
  return picked.join(', ');
}

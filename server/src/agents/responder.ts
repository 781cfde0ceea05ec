/**
 * Reply Writer
 *
 * Drafts the reply to an employer on the candidate's behalf. Actions the
 * writer wants to take are declared through tool calls and come back as
 * DeclaredActions; nothing is executed here. When the model calls tools, it
 * is told the actions were deferred and asked a second time for the reply
 * text itself.
 *
 * On a revision round the previous reply and the evaluator's feedback are
 * included in the final user turn.
 */

import { llm, getModelFor, MAX_TOKENS } from '../lib/llm.js';
import type { ChatMessage, ChatResponse, ContentBlock, LLMProvider, ToolDef } from '../lib/llm-provider.js';
import { withRetry } from '../lib/retry.js';
import { GenerationFailure, errorMessage } from '../lib/errors.js';
import logger from '../lib/logger.js';
import type { Logger } from '../lib/logger.js';
import { parseToolCall } from './schemas/reply-schemas.js';
import type { CandidateProfile } from './profile.js';
import type {
  Candidate,
  ConversationTurn,
  DeclaredAction,
  GenerationRequest,
  ResponseGenerator,
} from './types.js';

// ─── Tool definitions ────────────────────────────────────────────────

export const ACTION_TOOLS: ToolDef[] = [
  {
    name: 'schedule_interview',
    description: 'Propose an interview slot the employer offered or agreed to. Recorded only if the reply is approved.',
    input_schema: {
      type: 'object',
      properties: {
        date: { type: 'string', description: 'Interview date, e.g. 2026-11-04' },
        time: { type: 'string', description: 'Interview time with timezone' },
        format: { type: 'string', description: 'video, phone or onsite' },
        interviewer: { type: 'string', description: 'Interviewer name, if known' },
      },
      required: ['date', 'time', 'format'],
    },
  },
  {
    name: 'decline_offer',
    description: 'Record that the candidate is declining this opportunity.',
    input_schema: {
      type: 'object',
      properties: {
        company: { type: 'string' },
        reason: { type: 'string', description: 'Short, polite reason' },
      },
      required: ['company', 'reason'],
    },
  },
  {
    name: 'record_contact',
    description: 'Save the employer contact details found in the message.',
    input_schema: {
      type: 'object',
      properties: {
        email: { type: 'string' },
        company: { type: 'string' },
        name: { type: 'string' },
        role: { type: 'string' },
      },
      required: ['email', 'company'],
    },
  },
  {
    name: 'request_human_review',
    description: 'Hand the conversation to the candidate. Use for salary, contracts, legal questions, skills not in the profile, or whenever you are unsure.',
    input_schema: {
      type: 'object',
      properties: {
        question: { type: 'string', description: 'What the candidate needs to answer' },
        confidence: { type: 'number', description: 'Your confidence in answering alone, 0 to 1' },
      },
      required: ['question'],
    },
  },
];

const DEFERRED_NOTE = 'Noted. This action is held until the reply is approved.';
const FOLLOW_UP_INSTRUCTION = 'Based on the tool results above, write your professional reply to the employer. Reply with the message text only.';

// ─── System prompt ───────────────────────────────────────────────────

export function buildResponderSystemPrompt(profile: CandidateProfile): string {
  return `You are ${profile.name}'s career assistant. You answer potential employers on behalf of ${profile.name}.

TONE:
- Professional, concise and polite
- Enthusiastic but not desperate
- Confident about real skills and experience

RULES:
- Never claim a skill or experience that is not in the profile below.
- Never agree to salary, contract or legal terms. Call request_human_review instead.
- If asked about a technology the profile does not mention, call request_human_review, show interest in the role, and point to transferable experience.
- When the employer proposes an interview, call schedule_interview with the details.
- When the employer shares contact details, call record_contact.
- Reply with the message text only; no preamble, no signature placeholders.

PROFILE:
${profile.summary}`;
}

function buildRevisionPrompt(message: string, previous: string | null, feedback: string): string {
  return `Your previous reply to this employer was reviewed and needs improvement.

EMPLOYER MESSAGE:
${message}

PREVIOUS REPLY:
${previous ?? '(not available)'}

REVIEWER FEEDBACK:
${feedback}

Write an improved reply that addresses the feedback while staying professional and truthful. Keep it concise.`;
}

function toChatMessages(context: readonly ConversationTurn[]): ChatMessage[] {
  return context.map((turn): ChatMessage => ({
    role: turn.role === 'employer' ? 'user' : 'assistant',
    content: turn.text,
  }));
}

// ─── Generator ───────────────────────────────────────────────────────

export interface LlmResponseGeneratorOptions {
  profile: CandidateProfile;
  provider?: LLMProvider;
  model?: string;
  max_tokens?: number;
  log?: Logger;
}

export class LlmResponseGenerator implements ResponseGenerator {
  private readonly provider: LLMProvider;
  private readonly model: string;
  private readonly maxTokens: number;
  private readonly system: string;
  private readonly log: Logger;

  constructor(options: LlmResponseGeneratorOptions) {
    this.provider = options.provider ?? llm;
    this.model = options.model ?? getModelFor('responder');
    this.maxTokens = options.max_tokens ?? MAX_TOKENS;
    this.system = buildResponderSystemPrompt(options.profile);
    this.log = options.log ?? logger;
  }

  async generate(request: GenerationRequest): Promise<Candidate> {
    const finalTurn = request.feedback === null
      ? request.message
      : buildRevisionPrompt(request.message, request.previous_response, request.feedback);

    const messages: ChatMessage[] = [
      ...toChatMessages(request.context),
      { role: 'user', content: finalTurn },
    ];

    const first = await this.call(messages, true, request.signal);
    if (first.tool_calls.length === 0) {
      return { text: requireText(first.text), declared_actions: [] };
    }

    const declared_actions: DeclaredAction[] = [];
    const assistantBlocks: ContentBlock[] = [];
    const resultBlocks: ContentBlock[] = [];
    if (first.text.trim()) assistantBlocks.push({ type: 'text', text: first.text });

    for (const call of first.tool_calls) {
      assistantBlocks.push({ type: 'tool_use', id: call.id, name: call.name, input: call.input });
      const parsed = parseToolCall(call.name, call.input);
      if (parsed.ok) {
        declared_actions.push(parsed.action);
        resultBlocks.push({ type: 'tool_result', tool_use_id: call.id, content: JSON.stringify({ status: 'deferred', note: DEFERRED_NOTE }) });
      } else {
        this.log.warn({ tool: call.name, error: parsed.error }, 'Dropping invalid tool call');
        resultBlocks.push({ type: 'tool_result', tool_use_id: call.id, content: JSON.stringify({ status: 'rejected', error: parsed.error }) });
      }
    }
    resultBlocks.push({ type: 'text', text: FOLLOW_UP_INSTRUCTION });

    const second = await this.call(
      [...messages, { role: 'assistant', content: assistantBlocks }, { role: 'user', content: resultBlocks }],
      false,
      request.signal,
    );

    if (second.tool_calls.length > 0) {
      this.log.debug({ tools: second.tool_calls.map((c) => c.name) }, 'Ignoring tool calls on follow-up');
    }
    return { text: requireText(second.text), declared_actions };
  }

  private async call(messages: ChatMessage[], allowTools: boolean, signal: AbortSignal): Promise<ChatResponse> {
    const toolChoice = allowTools ? { type: 'auto' as const } : { type: 'none' as const };
    try {
      return await withRetry(
        () => this.provider.chat({
          model: this.model,
          system: this.system,
          messages,
          // Tools stay declared on the follow-up so the history's tool_use blocks remain valid.
          tools: ACTION_TOOLS,
          tool_choice: toolChoice,
          max_tokens: this.maxTokens,
          temperature: 0.7,
          signal,
        }),
        {
          signal,
          onRetry: (attempt, error) => {
            this.log.warn({ attempt, error: error.message }, 'Reply writer call failed; retrying');
          },
        },
      );
    } catch (err) {
      if (signal.aborted) throw err;
      throw new GenerationFailure(`Reply writer call failed: ${errorMessage(err)}`, { cause: err });
    }
  }
}

function requireText(text: string): string {
  const trimmed = text.trim();
  if (!trimmed) {
    throw new GenerationFailure('Reply writer returned empty text');
  }
  return trimmed;
}

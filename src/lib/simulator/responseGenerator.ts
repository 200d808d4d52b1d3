/**
 * Response generation for non-failing modes: chat-style replies, generic acks and echo.
 * Reply variants are keyed by message content and seed, never by draw order,
 * so the same message under the same seed always gets the same reply.
 */

import { EMPTY_MESSAGE_REPLY, REPLY_RULES, matchRule, reflect, type ReplyRule } from "./replyRules.js";
import type { JobMode, JobResult, JobUsage } from "./types.js";

export const CHAT_OPS: readonly string[] = ["llm.chat"];

interface ChatMessage {
  role?: unknown;
  content?: unknown;
}

function isChatMessage(v: unknown): v is ChatMessage {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

/** FNV-1a over UTF-16 code units. Unsigned 32-bit. */
export function fnv1a32(input: string): number {
  let h = 0x811c9dc5;
  for (let i = 0; i < input.length; i++) {
    h ^= input.charCodeAt(i);
    h = Math.imul(h, 0x01000193);
  }
  return h >>> 0;
}

export function countTokens(text: string): number {
  return text.split(/\s+/).filter(Boolean).length;
}

function messagesOf(args: Record<string, unknown>): unknown[] | undefined {
  const msgs = args.messages;
  return Array.isArray(msgs) ? msgs : undefined;
}

export function extractLastUserMessage(args: Record<string, unknown>): string {
  const msgs = messagesOf(args) ?? [];
  for (let i = msgs.length - 1; i >= 0; i--) {
    const m = msgs[i];
    if (isChatMessage(m) && m.role === "user") {
      return typeof m.content === "string" ? m.content : "";
    }
  }
  return "";
}

/** Whitespace tokens across all string message contents. */
export function countPromptTokens(args: Record<string, unknown>): number {
  const contents: string[] = [];
  for (const m of messagesOf(args) ?? []) {
    if (isChatMessage(m) && typeof m.content === "string") contents.push(m.content);
  }
  return countTokens(contents.join("\n"));
}

export function selectTemplate(templates: readonly string[], content: string, seed: number): string {
  if (templates.length === 0) return "";
  const idx = fnv1a32(`${seed}:${content}`) % templates.length;
  return templates[idx] ?? templates[0] ?? "";
}

export function generateReply(userText: string, seed: number, rules: readonly ReplyRule[] = REPLY_RULES): string {
  const s = userText.trim();
  if (!s) return EMPTY_MESSAGE_REPLY;
  for (const rule of rules) {
    const match = matchRule(rule.matcher, s);
    if (!match) continue;
    const tail = match.tail.replace(/\s+/g, " ").trim().replace(/^[ .!?]+|[ .!?]+$/g, "");
    const x = tail ? reflect(tail) : "that";
    const template = selectTemplate(rule.templates, userText, seed);
    return template.replaceAll("{x}", x).replaceAll("{k}", match.keyword ?? "");
  }
  return EMPTY_MESSAGE_REPLY;
}

/**
 * Whitespace-free serialization of args.messages, preserving element order and
 * object key insertion order. Integer-like keys come first, as in any JS object.
 */
export function canonicalEcho(args: Record<string, unknown>): string {
  const payload = args.messages === undefined ? [] : args.messages;
  return JSON.stringify(payload);
}

function isChatJob(op: string, args: Record<string, unknown>): boolean {
  return CHAT_OPS.includes(op) || messagesOf(args) !== undefined;
}

function withUsage(text: string, args: Record<string, unknown>): JobResult {
  const usage: JobUsage = {
    promptTokens: countPromptTokens(args),
    completionTokens: countTokens(text),
  };
  return { text, usage };
}

export interface GenerateInput {
  mode: JobMode;
  op: string;
  args: Record<string, unknown>;
  seed: number;
}

export function generateResult({ mode, op, args, seed }: GenerateInput): JobResult {
  if (mode === "echo") return withUsage(canonicalEcho(args), args);
  if (isChatJob(op, args)) return withUsage(generateReply(extractLastUserMessage(args), seed), args);
  return withUsage(`ok :: op=${op}`, args);
}

/**
 * Ordered reply rules for chat-style jobs. The first rule whose matcher fires wins;
 * `always` is the catch-all and must come last.
 * Templates: {x} = reflected tail after the match, {k} = matched keyword.
 */

export type ReplyMatcher =
  | { kind: "substring"; text: string }
  | { kind: "keywords"; words: readonly string[] }
  | { kind: "regex"; pattern: RegExp }
  | { kind: "always" };

export interface ReplyRule {
  matcher: ReplyMatcher;
  templates: readonly string[];
}

export interface ReplyMatch {
  /** Text following the match, as written by the user. */
  tail: string;
  keyword?: string;
}

export const EMPTY_MESSAGE_REPLY = "Hello. What would you like to talk about?";

export const REFLECTIONS: Readonly<Record<string, string>> = {
  i: "you",
  me: "you",
  my: "your",
  am: "are",
  you: "I",
  your: "my",
  yours: "mine",
  mine: "yours",
};

const GREETINGS = ["Hello. How are you feeling today?", "Hi. What's on your mind?"];

export const REPLY_RULES: readonly ReplyRule[] = [
  {
    matcher: { kind: "regex", pattern: /\bi need\b\s*([\s\S]*)$/i },
    templates: ["Why do you need {x}?", "Would it really help you to get {x}?", "Are you sure you need {x}?"],
  },
  {
    matcher: { kind: "regex", pattern: /\bi(?: am|'m)\b\s*([\s\S]*)$/i },
    templates: ["How long have you been {x}?", "How do you feel about being {x}?", "Why do you say you're {x}?"],
  },
  {
    matcher: { kind: "regex", pattern: /\bi feel\b\s*([\s\S]*)$/i },
    templates: ["Do you often feel {x}?", "When do you usually feel {x}?", "What makes you feel {x}?"],
  },
  {
    matcher: { kind: "substring", text: "because" },
    templates: ["Is that the real reason?", "What other reasons come to mind?", "Does that reason apply to anything else?"],
  },
  {
    matcher: { kind: "keywords", words: ["why"] },
    templates: ["What do you think?", "Why do you ask?", "What answer would satisfy you?"],
  },
  { matcher: { kind: "keywords", words: ["hello", "hi", "hey"] }, templates: GREETINGS },
  {
    matcher: { kind: "keywords", words: ["mother", "father"] },
    templates: ["Tell me more about your family.", "How is your relationship with your {k}?"],
  },
  {
    matcher: { kind: "keywords", words: ["always"] },
    templates: ["Can you think of a specific example?", "When exactly does that happen?"],
  },
  {
    matcher: { kind: "always" },
    templates: [
      "Please tell me more.",
      "How does that make you feel?",
      "Why do you say that?",
      "Can you elaborate on that?",
      "Let's explore that a bit further.",
    ],
  },
];

function normalizeWord(word: string): string {
  return word.toLowerCase().replace(/^[^\p{L}\p{N}']+|[^\p{L}\p{N}']+$/gu, "");
}

export function matchRule(matcher: ReplyMatcher, text: string): ReplyMatch | null {
  switch (matcher.kind) {
    case "substring": {
      const idx = text.toLowerCase().indexOf(matcher.text.toLowerCase());
      if (idx < 0) return null;
      return { tail: text.slice(idx + matcher.text.length) };
    }
    case "keywords": {
      const words = text.split(/\s+/).filter(Boolean);
      for (let i = 0; i < words.length; i++) {
        const w = normalizeWord(words[i] ?? "");
        if (matcher.words.includes(w)) {
          return { tail: words.slice(i + 1).join(" "), keyword: w };
        }
      }
      return null;
    }
    case "regex": {
      const m = matcher.pattern.exec(text);
      if (!m) return null;
      return { tail: m[1] ?? "" };
    }
    case "always":
      return { tail: "" };
  }
}

/** Swaps first/second person words ("my job" -> "your job"). */
export function reflect(text: string): string {
  return text
    .split(/\s+/)
    .filter(Boolean)
    .map((w) => REFLECTIONS[w.toLowerCase()] ?? w)
    .join(" ");
}

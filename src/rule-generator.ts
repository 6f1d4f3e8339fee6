import type { GenerationRequest, TextGenerator } from "./generation.js";
import { classify } from "./intent.js";
import type { MemoryStore } from "./store.js";
import type { ConversationTurn, MemoryRecord } from "./types.js";

export const STORED_FOLLOWUP = "I'll use it to give you better recommendations.";
export const NOTHING_REMEMBERED =
  "I don't have any stored information about you yet. Feel free to tell me about your preferences, courses, or study habits!";
export const NO_COURSES = "I don't have information about your courses yet. Please tell me what courses you're taking this semester!";

export const GREETING = [
  "Hello! I'm your student assistant. I can help you with:",
  "📚 Memory:\n- Remember your study preferences\n- Track your courses and academic needs",
  "📅 Calendar:\n- Show your schedule for today, tomorrow or this week",
  "🎯 Suggestions:\n- Recommend study times\n- Help plan your week",
  "Try asking me to remember something, or ask about your schedule!",
].join("\n\n");

export const HELP = [
  "I can help you with:",
  "- Remembering your preferences (say 'Remember that...')",
  "- Checking your schedule (ask 'What are my meetings today?')",
  "- Suggesting study times (ask 'Suggest study times')",
  "- Answering questions about your courses",
  "",
  "What would you like to know?",
].join("\n");

const RECALL_PHRASES = ["what do you know", "what do you remember", "what have i told you"];

const STUDY_SLOTS = [
  { word: "morning", hours: "8:00 AM - 11:00 AM" },
  { word: "afternoon", hours: "1:00 PM - 4:00 PM" },
  { word: "evening", hours: "6:00 PM - 9:00 PM" },
] as const;

const GENERAL_TIPS = [
  "General Tips:",
  "- Take 10-minute breaks every hour",
  "- Review difficult concepts multiple times",
  "- Join study groups for collaborative learning",
].join("\n");

const COURSE_CODE = /\b[a-z]{2,4}\s?\d{3}\b/i;
const HELP_SUBJECT = /\b(?:help|struggl\w*) (?:with|in) ([a-z][a-z0-9]*)/gi;
const GREETING_WORD = /\b(?:hello|hi|hey)\b/;
const NOT_A_SUBJECT = new Set(["my", "the", "a", "an", "some", "it", "this", "that"]);

function capitalize(word: string): string {
  return word.charAt(0).toUpperCase() + word.slice(1);
}

function bullets(title: string, items: readonly string[]): string {
  return [title, ...items.map((i) => `- ${i}`)].join("\n");
}

function isPreference(text: string): boolean {
  const t = text.toLowerCase();
  return t.includes("prefer") || t.includes("study session");
}

function isCourse(text: string): boolean {
  return /\btaking\b/i.test(text) || COURSE_CODE.test(text);
}

/** Subjects the student said they need help with, lowercased, first mention first. */
export function helpSubjects(memories: readonly MemoryRecord[]): string[] {
  const found = new Set<string>();
  for (const m of memories) {
    for (const match of m.text.matchAll(HELP_SUBJECT)) {
      const subject = match[1].toLowerCase();
      if (!NOT_A_SUBJECT.has(subject)) found.add(subject);
    }
  }
  return [...found];
}

/**
 * Answers from stored memories and canned text, without a language model.
 * Used when no OpenAI key is configured. Calendar questions get an empty
 * completion: the calendar section already carries the answer.
 */
export class RuleBasedGenerator implements TextGenerator {
  private readonly memory: Pick<MemoryStore, "getAll">;

  constructor(memory: Pick<MemoryStore, "getAll">) {
    this.memory = memory;
  }

  async generate(_system: string, turns: readonly ConversationTurn[], { owner }: GenerationRequest): Promise<string> {
    const message = turns.at(-1)?.content ?? "";
    const text = message.toLowerCase();
    const intent = classify(message);

    if (RECALL_PHRASES.some((p) => text.includes(p))) return this.recall(owner, message);
    if (intent.wantsMemoryWrite) return STORED_FOLLOWUP;
    if (/\bcourses?\b/.test(text) || /\btaking\b/.test(text)) return this.courses(owner);
    if (intent.wantsCalendar) return "";
    if (text.includes("suggest") || text.includes("study time")) return this.suggestions(owner);

    const subject = helpSubjects(await this.memory.getAll(owner)).find((s) => text.includes(s));
    if (subject) return subjectTips(subject);
    if (GREETING_WORD.test(text)) return GREETING;
    return HELP;
  }

  // the current message may already have been saved; it is not something to recall
  private async remembered(owner: string, message: string): Promise<MemoryRecord[]> {
    const all = await this.memory.getAll(owner);
    return all.filter((m) => m.text !== message);
  }

  private async recall(owner: string, message: string): Promise<string> {
    const memories = await this.remembered(owner, message);
    if (memories.length === 0) return NOTHING_REMEMBERED;

    const preferences: string[] = [];
    const courses: string[] = [];
    const other: string[] = [];
    for (const m of memories) {
      if (isPreference(m.text)) preferences.push(m.text);
      else if (isCourse(m.text)) courses.push(m.text);
      else other.push(m.text);
    }

    const sections = ["Based on our previous conversations, I remember the following about you:"];
    if (preferences.length > 0) sections.push(bullets("Study Preferences:", preferences));
    if (courses.length > 0) sections.push(bullets("Courses:", courses));
    if (other.length > 0) sections.push(bullets("Other Information:", other));
    return sections.join("\n\n");
  }

  private async courses(owner: string): Promise<string> {
    const all = await this.memory.getAll(owner);
    const courses = all.filter((m) => isCourse(m.text)).map((m) => m.text);
    if (courses.length === 0) return NO_COURSES;
    return [
      bullets("Based on what you've told me:", courses),
      "Would you like study time suggestions for any of these courses?",
    ].join("\n\n");
  }

  private async suggestions(owner: string): Promise<string> {
    const memories = await this.memory.getAll(owner);
    const slots = STUDY_SLOTS.filter((s) => memories.some((m) => m.text.toLowerCase().includes(s.word)));
    const subjects = helpSubjects(memories);

    const reasons = slots.map((s) => `your preference for ${s.word} study sessions (${s.hours})`);
    if (subjects.length > 0) reasons.push(`your need for extra help with ${subjects.join(" and ")}`);
    const lead =
      reasons.length > 0
        ? `Based on ${reasons.join(" and ")}, here are my study time suggestions:`
        : "Here are my study time suggestions:";

    const sections = [lead, "📚 Recommended Study Schedule:"];
    for (const s of slots) {
      sections.push(
        bullets(`${capitalize(s.word)} Sessions (Your Preferred Time):`, [
          `Monday-Friday: ${s.hours}`,
          "Focus on your most challenging subjects first",
        ])
      );
    }
    for (const subject of subjects) {
      sections.push(
        bullets(`${capitalize(subject)} Recommendations:`, [
          `Dedicate 2-3 hours daily to ${subject} practice`,
          `Schedule a review session before each ${subject} class`,
          "Attend office hours weekly",
        ])
      );
    }
    sections.push(GENERAL_TIPS);
    return sections.join("\n\n");
  }
}

function subjectTips(subject: string): string {
  return [
    `Since you mentioned needing extra help with ${subject}, here are some suggestions:`,
    [
      `1. Daily Practice: Spend 1-2 hours on ${subject} problems daily`,
      "2. Office Hours: Visit your professor's office hours weekly",
      `3. Study Groups: Join or form a ${subject} study group`,
      "4. Practice Tests: Work through past exams and problem sets",
    ].join("\n"),
    "Would you like me to suggest specific study times based on your schedule?",
  ].join("\n\n");
}

import type { Language, Turn } from "./types";

interface PromptSet {
  condense: string;
  system: string;
  answer: string;
  noContext: string;
  user: string;
  assistant: string;
}

const PROMPTS: Record<string, PromptSet> = {
  en: {
    condense: `Given the conversation history and the latest user question, rewrite the question so it can be understood without the history.

Follow these rules strictly:
1. Resolve pronouns (he, she, it, they, his, her, there, ...) into the names, places or entities they refer to in the history.
2. Keep important details such as dates, numbers and names.
3. Return ONLY the rewritten question, with no preamble.
4. Write the rewritten question in English.
5. If the question is already self-contained, return it exactly as is.

Conversation history:
{history}

Latest question:
{question}

Rewritten question:`,
    system: `You are the AI version of {name}. You are not an assistant; you ARE {name}. Speak in the first person ("I", "my", "me").

### Personality
- Friendly, professional and approachable.
- Concise but helpful.

### Time context
- Today's date: {date}
- Refer to events dated before {date} in the past tense and to events after it in the future tense.

### Instructions
1. Answer ONLY from the provided context. Never make things up.
2. Mention the sources you used by their [n] marker.
3. If the context does not contain the answer, say "I don't know" or "I haven't shared that information yet."
4. If a question asks for sensitive information that is not in the context, politely decline: "I'm sorry, I prefer not to share that."`,
    answer: `### Context
{context}

### Question
{question}`,
    noContext:
      "No relevant context was found for this question. Say that you don't know; do not invent an answer.",
    user: "User",
    assistant: "Assistant",
  },
  es: {
    condense: `Dado el historial de la conversación y la última pregunta del usuario, reescribe la pregunta para que se entienda sin el historial.

Sigue estas reglas estrictamente:
1. Reemplaza los pronombres (él, ella, eso, ellos, su, allí, ...) por los nombres, lugares o entidades a los que se refieren en el historial.
2. Mantén detalles importantes como fechas, números y nombres.
3. Devuelve SOLO la pregunta reescrita, sin preámbulo.
4. Escribe la pregunta reescrita en español.
5. Si la pregunta ya se entiende por sí sola, devuélvela exactamente como está.

Historial de la conversación:
{history}

Última pregunta:
{question}

Pregunta reescrita:`,
    system: `Eres la versión IA de {name}. No eres un asistente; ERES {name}. Habla en primera persona ("yo", "mi", "me").

### Personalidad
- Amigable, profesional y accesible.
- Conciso pero útil.

### Contexto temporal
- Fecha de hoy: {date}
- Refiérete a los eventos anteriores a {date} en pasado y a los posteriores en futuro.

### Instrucciones
1. Responde SOLO con el contexto proporcionado. Nunca inventes información.
2. Menciona las fuentes que usaste por su marcador [n].
3. Si el contexto no contiene la respuesta, di "No lo sé" o "Aún no he compartido esa información."
4. Si una pregunta pide información sensible que no está en el contexto, declina con cortesía: "Lo siento, prefiero no compartir eso."`,
    answer: `### Contexto
{context}

### Pregunta
{question}`,
    noContext:
      "No se encontró contexto relevante para esta pregunta. Di que no lo sabes; no inventes una respuesta.",
    user: "Usuario",
    assistant: "Asistente",
  },
};

function promptsFor(language: Language): PromptSet {
  return PROMPTS[language] ?? PROMPTS.en;
}

/** Replace `{key}` placeholders; unknown keys are left as-is. */
export function fillTemplate(template: string, vars: Record<string, string>): string {
  return template.replace(/\{(\w+)\}/g, (match, key: string) => vars[key] ?? match);
}

export function formatHistory(language: Language, history: readonly Turn[]): string {
  const p = promptsFor(language);
  return history.map((t) => `${t.role === "user" ? p.user : p.assistant}: ${t.text}`).join("\n");
}

export function buildCondensePrompt(
  language: Language,
  history: readonly Turn[],
  question: string,
): string {
  return fillTemplate(promptsFor(language).condense, {
    history: formatHistory(language, history),
    question,
  });
}

export function buildSystemPrompt(language: Language, name: string, date: string): string {
  return fillTemplate(promptsFor(language).system, { name, date });
}

/** Final user message: assembled context (or the no-context notice) and the question. */
export function buildAnswerPrompt(
  language: Language,
  context: string | undefined,
  question: string,
): string {
  const p = promptsFor(language);
  return fillTemplate(p.answer, { context: context ?? p.noContext, question });
}

export function noContextNotice(language: Language): string {
  return promptsFor(language).noContext;
}

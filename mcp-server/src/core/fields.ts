// src/core/fields.ts
import { z } from "zod";

export const FIELD_NAMES = ["content", "attitude", "form", "body", "response"] as const;

export const FieldNameZod = z.enum(FIELD_NAMES);
export type FieldName = z.infer<typeof FieldNameZod>;

/** Canned answers offered for the expression-form field. Freeform text is accepted too. */
export const FORM_CHOICES = [
  "Да-принимающее",
  "Нет-принимающее",
  "Да-отрицающее",
  "Нет-отрицающее",
] as const;

export type FieldDefinition = {
  readonly name: FieldName;
  readonly label: string;
  readonly prompt: string;
  readonly required: boolean;
  readonly choices?: readonly string[];
};

export const PRACTICE_FIELDS: readonly FieldDefinition[] = Object.freeze([
  {
    name: "content",
    label: "Содержание",
    prompt:
      "Обрати внимание на какое-то содержание, которое находится в поле внимания (внутреннее или внешнее).",
    required: true,
  },
  {
    name: "attitude",
    label: "Отношение",
    prompt:
      "Осознай своё отношение к этому содержанию - обрати внимание на тело, на баланс расслабления и напряжения по поводу этого содержания.",
    required: true,
  },
  {
    name: "form",
    label: "Форма согласия",
    prompt:
      "Подбери свою форму выражения этого отношения, вербализовав его, используя наши формы согласия и отрицания (да-принимающее, нет-принимающее, да-отрицающее, нет-отрицающее).",
    required: true,
    choices: FORM_CHOICES,
  },
  {
    name: "body",
    label: "Реакция тела",
    prompt: "Озвучь для себя и обрати внимание соответствует ли то, что ты осознал телесной реакции.",
    required: true,
  },
  {
    name: "response",
    label: "Изменения",
    prompt: "Обрати внимание, что будет происходить с тобой после осознания.",
    required: true,
  },
]);

export function fieldAt(index: number): FieldDefinition | undefined {
  if (!Number.isInteger(index) || index < 0 || index >= PRACTICE_FIELDS.length) return undefined;
  return PRACTICE_FIELDS[index];
}

export function fieldByName(name: FieldName): FieldDefinition {
  const index = PRACTICE_FIELDS.findIndex((field) => field.name === name);
  const field = fieldAt(index);
  if (!field) throw new Error(`Unknown practice field: ${name}`);
  return field;
}

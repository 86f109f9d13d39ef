// src/utils/cn.ts
export type ClassValue = string | false | null | undefined;

/** Склеивает tailwind-классы, пропуская пустые. */
export function cn(...parts: ClassValue[]): string {
  return parts.filter(Boolean).join(" ");
}

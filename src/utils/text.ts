export function pad(value: number): string {
  return value.toString().padStart(2, "0");
}

export function foldCase(text: string): string {
  return text.trim().toLowerCase();
}

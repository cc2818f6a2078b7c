import type { CsvValue } from "@/types/tiktok";

export function formatCsvField(value: CsvValue): string {
  if (value === null || value === undefined) return "";
  const text = String(value);
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

export function formatCsvRow(values: readonly CsvValue[]): string {
  return values.map(formatCsvField).join(",") + "\n";
}

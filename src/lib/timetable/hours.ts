const MAX_HOUR = 20;

// "1", "1.", "2 08:00-08:45", "3. 8.50 – 9.35", "4 (10:35) 11:20 Uhr";
// times after the number are ignored, whatever separates them
const hourLabelRegex =
  /^(\d{1,2})(?!\d)\.?(?:[\s()\-–—,/]*(?:\d{1,2}[:.]\d{2}|uhr))*[\s()]*$/i;

export type HourLabel = {
  label: string;
  number: number;
};

export function parseHourLabel(text: string): HourLabel | null {
  const cleaned = text.replaceAll(/\s+/g, ' ').trim();
  const match = cleaned.match(hourLabelRegex);
  if (!match) return null;
  const number = Number(match[1]);
  if (!Number.isInteger(number) || number > MAX_HOUR) return null;
  return { label: String(number), number };
}

export function compareHours(a: string, b: string): number {
  return Number(a) - Number(b);
}

const PLACEHOLDER_RE = /\{\{([^{}]+)\}\}/g;
const FORMAT_TOKEN_RE =
  /\[([^\]]*)\]|YYYY|YY|MMMM|MMM|MM|M|DDDD|DDD|DD|D|dddd|ddd|dd|d|HH|H|hh|h|mm|m|ss|s|ww|w|A|a/g;
const OFFSET_RE = /^(?:\s*[+-]?\d+[dwmy])+\s*$/;
const OFFSET_PART_RE = /([+-]?)(\d+)([dwmy])/g;
const ARITHMETIC_RE = /^(-?\d+(?:\.\d+)?)\s*([+\-*/%])\s*(-?\d+(?:\.\d+)?)$/;

const MONTHS = [
  "January", "February", "March", "April", "May", "June",
  "July", "August", "September", "October", "November", "December",
];
const WEEKDAYS = ["Sunday", "Monday", "Tuesday", "Wednesday", "Thursday", "Friday", "Saturday"];

export type TemplateVariables = Readonly<Record<string, string>>;

const pad = (n: number, width = 2): string => String(n).padStart(width, "0");

function dayOfYear(date: Date): number {
  const start = Date.UTC(date.getFullYear(), 0, 1);
  const today = Date.UTC(date.getFullYear(), date.getMonth(), date.getDate());
  return (today - start) / 86_400_000 + 1;
}

function isoWeek(date: Date): number {
  const t = new Date(Date.UTC(date.getFullYear(), date.getMonth(), date.getDate()));
  const weekday = t.getUTCDay() || 7;
  t.setUTCDate(t.getUTCDate() + 4 - weekday);
  const yearStart = Date.UTC(t.getUTCFullYear(), 0, 1);
  return Math.ceil(((t.getTime() - yearStart) / 86_400_000 + 1) / 7);
}

/** Format a date with moment-style tokens. Text in [brackets] is literal. */
export function formatDate(date: Date, format: string): string {
  const hours12 = date.getHours() % 12 || 12;
  return format.replace(FORMAT_TOKEN_RE, (token: string, literal: string | undefined) => {
    if (literal !== undefined) return literal;
    switch (token) {
      case "YYYY": return String(date.getFullYear());
      case "YY": return pad(date.getFullYear() % 100);
      case "MMMM": return MONTHS[date.getMonth()] ?? "";
      case "MMM": return (MONTHS[date.getMonth()] ?? "").slice(0, 3);
      case "MM": return pad(date.getMonth() + 1);
      case "M": return String(date.getMonth() + 1);
      case "DDDD": return pad(dayOfYear(date), 3);
      case "DDD": return String(dayOfYear(date));
      case "DD": return pad(date.getDate());
      case "D": return String(date.getDate());
      case "dddd": return WEEKDAYS[date.getDay()] ?? "";
      case "ddd": return (WEEKDAYS[date.getDay()] ?? "").slice(0, 3);
      case "dd": return (WEEKDAYS[date.getDay()] ?? "").slice(0, 2);
      case "d": return String(date.getDay());
      case "HH": return pad(date.getHours());
      case "H": return String(date.getHours());
      case "hh": return pad(hours12);
      case "h": return String(hours12);
      case "mm": return pad(date.getMinutes());
      case "m": return String(date.getMinutes());
      case "ss": return pad(date.getSeconds());
      case "s": return String(date.getSeconds());
      case "ww": return pad(isoWeek(date));
      case "w": return String(isoWeek(date));
      case "A": return date.getHours() < 12 ? "AM" : "PM";
      case "a": return date.getHours() < 12 ? "am" : "pm";
      default: return token;
    }
  });
}

/** Add months, clamping to the last day of the target month. */
function addMonths(date: Date, months: number): Date {
  const result = new Date(date);
  const day = result.getDate();
  result.setDate(1);
  result.setMonth(result.getMonth() + months);
  const lastDay = new Date(result.getFullYear(), result.getMonth() + 1, 0).getDate();
  result.setDate(Math.min(day, lastDay));
  return result;
}

/** Apply offsets like "-7d", "+1w", "2m", "-1y"; several may be chained. */
export function applyDateOffset(date: Date, offset: string): Date | undefined {
  if (offset.trim() === "") return date;
  if (!OFFSET_RE.test(offset)) return undefined;

  let result = new Date(date);
  for (const [, sign, digits, unit] of offset.matchAll(OFFSET_PART_RE)) {
    const amount = Number(digits) * (sign === "-" ? -1 : 1);
    switch (unit) {
      case "d":
        result.setDate(result.getDate() + amount);
        break;
      case "w":
        result.setDate(result.getDate() + amount * 7);
        break;
      case "m":
        result = addMonths(result, amount);
        break;
      case "y":
        result = addMonths(result, amount * 12);
        break;
    }
  }
  return result;
}

function evaluateDate(expression: string, now: Date): string | undefined {
  const bar = expression.indexOf("|");
  const format = (bar === -1 ? expression : expression.slice(0, bar)).trim();
  const offset = bar === -1 ? "" : expression.slice(bar + 1);
  if (format === "") return undefined;

  const date = applyDateOffset(now, offset);
  return date && formatDate(date, format);
}

function evaluateArithmetic(expression: string): string | undefined {
  const match = ARITHMETIC_RE.exec(expression);
  if (!match) return undefined;
  const left = Number(match[1]);
  const right = Number(match[3]);

  switch (match[2]) {
    case "+": return String(left + right);
    case "-": return String(left - right);
    case "*": return String(left * right);
    case "/": return right === 0 ? undefined : String(left / right);
    case "%": return Math.trunc(right) === 0 ? undefined : String(Math.trunc(left) % Math.trunc(right));
    default: return undefined;
  }
}

/**
 * Substitute `{{...}}` placeholders in one pass: caller variables first, then
 * `{{date}}`, `{{time}}`, `{{date:FORMAT|OFFSET}}` and simple arithmetic.
 * Anything unresolved stays as written.
 */
export function renderTemplate(
  template: string,
  variables: TemplateVariables = {},
  now: Date = new Date()
): string {
  return template.replace(PLACEHOLDER_RE, (placeholder: string, inner: string) => {
    const key = inner.trim();
    if (Object.hasOwn(variables, inner)) return variables[inner] ?? placeholder;
    if (Object.hasOwn(variables, key)) return variables[key] ?? placeholder;

    if (key === "date") return formatDate(now, "YYYY-MM-DD");
    if (key === "time") return formatDate(now, "HH:mm");
    if (key.startsWith("date:")) return evaluateDate(key.slice("date:".length), now) ?? placeholder;
    return evaluateArithmetic(key) ?? placeholder;
  });
}

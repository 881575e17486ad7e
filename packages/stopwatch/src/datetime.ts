/**
 * strftime-style rendering of local wall-clock time.
 *
 * Supported directives: %Y %m %d %H %I %M %S %p %A %a %B %b %j %%.
 * Unknown directives are kept as written.
 */

const WEEKDAYS = ["Sunday", "Monday", "Tuesday", "Wednesday", "Thursday", "Friday", "Saturday"];
const MONTHS = [
  "January",
  "February",
  "March",
  "April",
  "May",
  "June",
  "July",
  "August",
  "September",
  "October",
  "November",
  "December",
];

const DIRECTIVE_REGEX = /%(.)/g;
const MS_PER_DAY = 86_400_000;

function pad(value: number, width = 2): string {
  return String(value).padStart(width, "0");
}

function dayOfYear(date: Date): number {
  const startOfYear = Date.UTC(date.getFullYear(), 0, 1);
  const today = Date.UTC(date.getFullYear(), date.getMonth(), date.getDate());
  return (today - startOfYear) / MS_PER_DAY + 1;
}

function renderDirective(date: Date, directive: string): string | undefined {
  switch (directive) {
    case "Y":
      return String(date.getFullYear());
    case "m":
      return pad(date.getMonth() + 1);
    case "d":
      return pad(date.getDate());
    case "H":
      return pad(date.getHours());
    case "I":
      return pad(date.getHours() % 12 === 0 ? 12 : date.getHours() % 12);
    case "M":
      return pad(date.getMinutes());
    case "S":
      return pad(date.getSeconds());
    case "p":
      return date.getHours() < 12 ? "AM" : "PM";
    case "A":
      return WEEKDAYS[date.getDay()];
    case "a":
      return WEEKDAYS[date.getDay()]?.slice(0, 3);
    case "B":
      return MONTHS[date.getMonth()];
    case "b":
      return MONTHS[date.getMonth()]?.slice(0, 3);
    case "j":
      return pad(dayOfYear(date), 3);
    case "%":
      return "%";
    default:
      return undefined;
  }
}

/** Render `date` in local time using a strftime-style pattern */
export function formatClock(date: Date, pattern: string): string {
  return pattern.replace(
    DIRECTIVE_REGEX,
    (match, directive: string) => renderDirective(date, directive) ?? match,
  );
}

/**
 * Format templates for duration reports and messages.
 *
 * Placeholders: `{}` (next positional value), `{0}` (positional index),
 * `{name}` (named value), each optionally followed by `:spec` where spec is
 * `[0][width][,][.precision][type]` and type is one of `f`, `d`, `s`, `%`.
 * A precision with no type counts significant digits (`{:.2}` of 3.14159
 * is `3.1`).
 * `{{` and `}}` render literal braces.
 */

import { StopwatchInvalidFormatError } from "@lapwatch/errors";

const TOKEN_REGEX = /\{\{|\}\}|\{([^{}]*)\}|[{}]/g;
const SPEC_REGEX = /^(0)?(\d+)?(,)?(?:\.(\d+))?([dfs%])?$/;
const INDEX_REGEX = /^\d+$/;

interface FormatSpec {
  readonly zeroPad: boolean;
  readonly width: number;
  readonly grouping: boolean;
  readonly precision: number | undefined;
  readonly type: "d" | "f" | "s" | "%" | undefined;
}

function parseSpec(template: string, spec: string): FormatSpec {
  const match = SPEC_REGEX.exec(spec);
  if (!match) {
    throw new StopwatchInvalidFormatError(template, `unsupported format spec ":${spec}"`);
  }
  const [, zero, width, comma, precision, type] = match;
  return {
    zeroPad: zero !== undefined,
    width: width === undefined ? 0 : Number(width),
    grouping: comma !== undefined,
    precision: precision === undefined ? undefined : Number(precision),
    type: type === "d" || type === "f" || type === "s" || type === "%" ? type : undefined,
  };
}

function groupThousands(digits: string): string {
  return digits.replace(/\B(?=(\d{3})+(?!\d))/g, ",");
}

function stripTrailingZeros(text: string): string {
  return text.includes(".") ? text.replace(/\.?0+$/, "") : text;
}

/**
 * A precision without a type counts significant digits. Fixed notation keeps
 * at least one decimal (`100.0`); exponents below -4, or at one less than the
 * precision and above, switch to `1.2e+03`.
 */
function significantDigits(value: number, precision: number): string {
  if (!Number.isFinite(value)) return String(value);
  if (value === 0) return "0.0";
  const digits = Math.max(precision, 1);
  const [mantissa = "", exponentText = "0"] = value.toExponential(digits - 1).split("e");
  const exponent = Number(exponentText);
  if (exponent < -4 || exponent >= digits - 1) {
    const sign = exponent < 0 ? "-" : "+";
    return `${stripTrailingZeros(mantissa)}e${sign}${String(Math.abs(exponent)).padStart(2, "0")}`;
  }
  const fixed = stripTrailingZeros(value.toFixed(digits - 1 - exponent));
  return fixed.includes(".") ? fixed : `${fixed}.0`;
}

function formatNumber(template: string, value: number, spec: FormatSpec): string {
  let body: string;
  switch (spec.type) {
    case "d":
      if (!Number.isInteger(value)) {
        throw new StopwatchInvalidFormatError(template, `"d" requires an integer, got ${value}`);
      }
      body = Math.abs(value).toFixed(0);
      break;
    case "%":
      body = `${Math.abs(value * 100).toFixed(spec.precision ?? 6)}%`;
      break;
    case "f":
      body = Math.abs(value).toFixed(spec.precision ?? 6);
      break;
    case "s":
      throw new StopwatchInvalidFormatError(template, `"s" cannot format the number ${value}`);
    default:
      body =
        spec.precision === undefined
          ? String(Math.abs(value))
          : significantDigits(Math.abs(value), spec.precision);
      break;
  }

  if (spec.grouping) {
    const [integer = "", ...rest] = body.split(".");
    body = [groupThousands(integer), ...rest].join(".");
  }

  const sign = value < 0 || Object.is(value, -0) ? "-" : "";
  const padding = Math.max(0, spec.width - sign.length - body.length);
  if (spec.zeroPad) {
    return `${sign}${"0".repeat(padding)}${body}`;
  }
  return `${" ".repeat(padding)}${sign}${body}`;
}

function applySpec(template: string, value: unknown, rawSpec: string): string {
  const spec = parseSpec(template, rawSpec);

  if (typeof value === "number") {
    return formatNumber(template, value, spec);
  }

  if (spec.type !== undefined && spec.type !== "s") {
    throw new StopwatchInvalidFormatError(
      template,
      `"${spec.type}" requires a number, got ${typeof value}`,
    );
  }
  const text = String(value);
  const truncated = spec.precision === undefined ? text : text.slice(0, spec.precision);
  return truncated.padEnd(spec.width, spec.zeroPad ? "0" : " ");
}

/**
 * Render a template with positional and named values.
 *
 * @throws {StopwatchInvalidFormatError} when a placeholder has no value,
 * a spec is unsupported, or a brace is unbalanced
 */
export function formatTemplate(
  template: string,
  positional: readonly unknown[] = [],
  named: Readonly<Record<string, unknown>> = {},
): string {
  let nextIndex = 0;

  return template.replace(TOKEN_REGEX, (token: string, body: string | undefined) => {
    if (token === "{{") return "{";
    if (token === "}}") return "}";
    if (body === undefined) {
      throw new StopwatchInvalidFormatError(template, `single '${token}' encountered`);
    }

    const separator = body.indexOf(":");
    const field = separator === -1 ? body : body.slice(0, separator);
    const spec = separator === -1 ? "" : body.slice(separator + 1);

    if (field === "" || INDEX_REGEX.test(field)) {
      const index = field === "" ? nextIndex++ : Number(field);
      if (index >= positional.length) {
        throw new StopwatchInvalidFormatError(
          template,
          `placeholder {${index}} has no value (${positional.length} given)`,
        );
      }
      return applySpec(template, positional[index], spec);
    }

    if (!Object.hasOwn(named, field)) {
      throw new StopwatchInvalidFormatError(template, `no value for field "${field}"`);
    }
    return applySpec(template, named[field], spec);
  });
}

// ─── Date and Time Functions ───────────────────────────────────────
// A datetime is a Number: whole days since 1970-01-01 plus the time of
// day as a fraction (0.25 is 06:00, 0.75 is 18:00). Adding 7 moves a
// date one week on. All functions work in UTC.

import { arity } from "../engine/arity";
import { defineFunction, type FunctionDefinition, type NativeFunction } from "../engine/environment";
import { NativeError } from "../engine/errors";
import { booleanValue, numberValue, stringValue, type Value } from "../engine/value";
import { defaultNumber, defaultString, numberParam, stringParam } from "./helpers";

const MS_PER_DAY = 86_400_000;

const MONTH_NAMES = [
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
] as const;

/** Indexed by `Date#getUTCDay`, Sunday first. */
const DAY_NAMES = [
  "Sunday",
  "Monday",
  "Tuesday",
  "Wednesday",
  "Thursday",
  "Friday",
  "Saturday",
] as const;

/** Offsets in minutes for the named zones RFC 2822 allows. */
const RFC2822_ZONES: Record<string, number> = {
  UT: 0,
  GMT: 0,
  Z: 0,
  EST: -300,
  EDT: -240,
  CST: -360,
  CDT: -300,
  MST: -420,
  MDT: -360,
  PST: -480,
  PDT: -420,
};

// ─── Conversion ────────────────────────────────────────────────────

function outOfRange(): NativeError {
  return NativeError.custom("datetime out of range");
}

function toDate(value: number): Date {
  const date = new Date(Math.round(value * MS_PER_DAY));
  if (Number.isNaN(date.getTime())) throw outOfRange();
  return date;
}

function fromDate(date: Date): Value {
  const time = date.getTime();
  if (Number.isNaN(time)) throw outOfRange();
  return numberValue(time / MS_PER_DAY);
}

function datetimeParam(params: readonly Value[], index: number, expected: number): Date {
  return toDate(numberParam(params, index, expected));
}

/** Builds a UTC date without `Date.UTC`'s remapping of years 0 to 99. */
function utcDateTime(
  year: number,
  month: number,
  day: number,
  hour = 0,
  minute = 0,
  second = 0,
  millisecond = 0
): Date {
  const date = new Date(0);
  date.setUTCFullYear(year, month - 1, day);
  date.setUTCHours(hour, minute, second, millisecond);
  return date;
}

function isLeapYear(year: number): boolean {
  return year % 4 === 0 && (year % 100 !== 0 || year % 400 === 0);
}

function daysInMonth(year: number, month: number): number {
  if (month === 2) return isLeapYear(year) ? 29 : 28;
  return month === 4 || month === 6 || month === 9 || month === 11 ? 30 : 31;
}

function isValidDate(year: number, month: number, day: number): boolean {
  return month >= 1 && month <= 12 && day >= 1 && day <= daysInMonth(year, month);
}

function isValidTime(hour: number, minute: number, second: number, millisecond: number): boolean {
  return (
    hour >= 0 &&
    hour < 24 &&
    minute >= 0 &&
    minute < 60 &&
    second >= 0 &&
    second < 60 &&
    millisecond >= 0 &&
    millisecond < 1000
  );
}

/** Moves by whole months, clamping the day to the target month's length. */
function addMonths(date: Date, months: number): Date {
  const total = date.getUTCFullYear() * 12 + date.getUTCMonth() + months;
  const year = Math.floor(total / 12);
  const month = total - year * 12 + 1;
  const result = new Date(date.getTime());
  result.setUTCFullYear(year, month - 1, Math.min(date.getUTCDate(), daysInMonth(year, month)));
  return result;
}

// ─── Format Strings ────────────────────────────────────────────────

type FormatToken =
  | { readonly kind: "spec"; readonly spec: string }
  | { readonly kind: "space"; readonly text: string }
  | { readonly kind: "literal"; readonly text: string };

const COMPOSITE_SPECS: Record<string, string> = {
  F: "%Y-%m-%d",
  T: "%H:%M:%S",
};

function formatTokens(format: string): FormatToken[] {
  return Array.from(format.matchAll(/%(.?)|(\s+)|([^%\s]+)/gsu), (match): FormatToken => {
    const [, spec, space, literal] = match;
    if (spec !== undefined) return { kind: "spec", spec };
    if (space !== undefined) return { kind: "space", text: space };
    return { kind: "literal", text: literal ?? "" };
  });
}

function unsupported(spec: string): NativeError {
  return NativeError.custom(`unsupported format specifier '%${spec}'`);
}

function pad(value: number, width: number, fill = "0"): string {
  return String(value).padStart(width, fill);
}

function formatYear(year: number): string {
  if (year >= 0 && year <= 9999) return pad(year, 4);
  return year < 0 ? `-${pad(-year, 4)}` : `+${year}`;
}

function monthName(date: Date): string {
  return MONTH_NAMES[date.getUTCMonth()] ?? "";
}

function dayName(date: Date): string {
  return DAY_NAMES[date.getUTCDay()] ?? "";
}

function formatSpec(date: Date, spec: string): string {
  const hour = date.getUTCHours();
  switch (spec) {
    case "Y":
      return formatYear(date.getUTCFullYear());
    case "y":
      return pad(((date.getUTCFullYear() % 100) + 100) % 100, 2);
    case "m":
      return pad(date.getUTCMonth() + 1, 2);
    case "d":
      return pad(date.getUTCDate(), 2);
    case "e":
      return pad(date.getUTCDate(), 2, " ");
    case "H":
      return pad(hour, 2);
    case "I":
      return pad(hour % 12 === 0 ? 12 : hour % 12, 2);
    case "p":
      return hour < 12 ? "AM" : "PM";
    case "M":
      return pad(date.getUTCMinutes(), 2);
    case "S":
      return pad(date.getUTCSeconds(), 2);
    case "b":
      return monthName(date).slice(0, 3);
    case "B":
      return monthName(date);
    case "a":
      return dayName(date).slice(0, 3);
    case "A":
      return dayName(date);
    case "%":
      return "%";
  }
  const composite = COMPOSITE_SPECS[spec];
  if (composite === undefined) throw unsupported(spec);
  return formatDate(date, composite);
}

/** strftime-style formatting; see {@link formatSpec} for the specifiers. */
function formatDate(date: Date, format: string): string {
  return formatTokens(format)
    .map((token) => (token.kind === "spec" ? formatSpec(date, token.spec) : token.text))
    .join("");
}

// ─── Parsing ───────────────────────────────────────────────────────

interface ParsedFields {
  year?: number;
  month?: number;
  day?: number;
  hour?: number;
  hour12?: number;
  pm?: boolean;
  minute?: number;
  second?: number;
}

function nameIndex(names: readonly string[], text: string): number {
  const lower = text.toLowerCase();
  return names.findIndex(
    (name) => name.toLowerCase() === lower || name.slice(0, 3).toLowerCase() === lower
  );
}

/**
 * Reads `input` against a strftime-style format. Whitespace in the format
 * matches any run of whitespace, including none; other characters must
 * appear as written.
 */
function parseFields(input: string, format: string): ParsedFields {
  const fields: ParsedFields = {};
  let pos = 0;

  const mismatch = (): NativeError =>
    NativeError.custom(
      pos >= input.length ? "premature end of input" : "input contains invalid characters"
    );
  const take = (pattern: RegExp): string => {
    const match = pattern.exec(input.slice(pos));
    if (match === null) throw mismatch();
    pos += match[0].length;
    return match[0];
  };
  const twoDigits = (): number => Number(take(/^\d{1,2}/));

  const read = (tokens: readonly FormatToken[]): void => {
    for (const token of tokens) {
      if (token.kind === "space") {
        take(/^\s*/);
        continue;
      }
      if (token.kind === "literal") {
        if (!input.startsWith(token.text, pos)) throw mismatch();
        pos += token.text.length;
        continue;
      }

      switch (token.spec) {
        case "Y":
          fields.year = Number(take(/^(?:[+-]\d+|\d{1,4})/));
          break;
        case "y": {
          const year = twoDigits();
          fields.year = year < 69 ? 2000 + year : 1900 + year;
          break;
        }
        case "m":
          fields.month = twoDigits();
          break;
        case "d":
          fields.day = twoDigits();
          break;
        case "e":
          fields.day = Number(take(/^ ?\d{1,2}/));
          break;
        case "H":
          fields.hour = twoDigits();
          break;
        case "I":
          fields.hour12 = twoDigits();
          break;
        case "p":
          fields.pm = take(/^[AaPp][Mm]/).toUpperCase() === "PM";
          break;
        case "M":
          fields.minute = twoDigits();
          break;
        case "S":
          fields.second = twoDigits();
          break;
        case "b":
        case "B": {
          const index = nameIndex(MONTH_NAMES, take(/^[A-Za-z]+/));
          if (index === -1) throw NativeError.custom("input contains invalid characters");
          fields.month = index + 1;
          break;
        }
        case "a":
        case "A":
          if (nameIndex(DAY_NAMES, take(/^[A-Za-z]+/)) === -1) {
            throw NativeError.custom("input contains invalid characters");
          }
          break;
        case "%":
          take(/^%/);
          break;
        default: {
          const composite = COMPOSITE_SPECS[token.spec];
          if (composite === undefined) throw unsupported(token.spec);
          read(formatTokens(composite));
        }
      }
    }
  };

  read(formatTokens(format));
  if (pos < input.length) throw NativeError.custom("trailing input");
  return fields;
}

function notEnough(): NativeError {
  return NativeError.custom("input is not enough for unique date and time");
}

function badRange(): NativeError {
  return NativeError.custom("input is out of range");
}

function resolveDate(fields: ParsedFields): [number, number, number] {
  const { year, month, day } = fields;
  if (year === undefined || month === undefined || day === undefined) throw notEnough();
  if (!isValidDate(year, month, day)) throw badRange();
  return [year, month, day];
}

function resolveTime(fields: ParsedFields): [number, number, number] {
  const { hour12, pm, minute, second = 0 } = fields;
  let { hour } = fields;
  if (hour === undefined && hour12 !== undefined && pm !== undefined) {
    if (hour12 < 1 || hour12 > 12) throw badRange();
    hour = (hour12 % 12) + (pm ? 12 : 0);
  }
  if (hour === undefined || minute === undefined) throw notEnough();
  if (!isValidTime(hour, minute, second, 0)) throw badRange();
  return [hour, minute, second];
}

function stringToDate(params: readonly Value[]): Value {
  const input = stringParam(params, 0, 1);
  const fields = parseFields(input, defaultString(params, 1, "%Y-%m-%d"));
  return fromDate(utcDateTime(...resolveDate(fields)));
}

function stringToTime(params: readonly Value[]): Value {
  const input = stringParam(params, 0, 1);
  const fields = parseFields(input, defaultString(params, 1, "%H:%M:%S"));
  return fromDate(utcDateTime(1970, 1, 1, ...resolveTime(fields)));
}

function stringToDatetime(params: readonly Value[]): Value {
  const input = stringParam(params, 0, 1);
  const fields = parseFields(input, defaultString(params, 1, "%Y-%m-%d %H:%M:%S"));
  return fromDate(utcDateTime(...resolveDate(fields), ...resolveTime(fields)));
}

function dateToString(params: readonly Value[]): Value {
  const format = stringParam(params, 0, 2);
  return stringValue(formatDate(datetimeParam(params, 1, 2), format));
}

// ─── RFC 2822 / RFC 3339 ───────────────────────────────────────────

const RFC2822 =
  /^\s*(?:([A-Za-z]{3})\s*,\s*)?(\d{1,2})\s+([A-Za-z]{3})\s+(\d{4})\s+(\d{2}):(\d{2})(?::(\d{2}))?\s+([+-]\d{4}|[A-Za-z]+)\s*$/;

const RFC3339 =
  /^(\d{4})-(\d{2})-(\d{2})[Tt ](\d{2}):(\d{2}):(\d{2})(?:\.(\d+))?([Zz]|[+-]\d{2}:\d{2})$/;

/** Minutes east of UTC for `+hhmm`, `+hh:mm` or a named zone. */
function zoneOffset(zone: string): number {
  const numeric = /^([+-])(\d{2}):?(\d{2})$/.exec(zone);
  if (numeric === null) {
    const named = RFC2822_ZONES[zone.toUpperCase()];
    if (named === undefined) throw NativeError.custom("input contains invalid characters");
    return named;
  }
  const [, sign, hours = "0", minutes = "0"] = numeric;
  const offset = Number(hours) * 60 + Number(minutes);
  return sign === "-" ? -offset : offset;
}

interface WallClock {
  readonly year: number;
  readonly month: number;
  readonly day: number;
  readonly hour: number;
  readonly minute: number;
  readonly second: number;
  readonly millisecond: number;
}

/** The instant a wall clock shows at `offset` minutes east of UTC. */
function instantAt(clock: WallClock, offset: number): Date {
  const { year, month, day, hour, minute, second, millisecond } = clock;
  if (!isValidDate(year, month, day) || !isValidTime(hour, minute, second, millisecond)) {
    throw badRange();
  }
  const local = utcDateTime(year, month, day, hour, minute, second, millisecond);
  return new Date(local.getTime() - offset * 60_000);
}

function dateFromRfc2822(params: readonly Value[]): Value {
  const match = RFC2822.exec(stringParam(params, 0, 1));
  if (match === null) throw NativeError.custom("input contains invalid characters");
  const [, weekday, day = "", monthText = "", year = "", hour = "", minute = "", second = "0", zone = ""] =
    match;

  const month = nameIndex(MONTH_NAMES, monthText) + 1;
  if (month === 0) throw NativeError.custom("input contains invalid characters");
  const offset = zoneOffset(zone);
  const date = instantAt(
    {
      year: Number(year),
      month,
      day: Number(day),
      hour: Number(hour),
      minute: Number(minute),
      second: Number(second),
      millisecond: 0,
    },
    offset
  );

  if (weekday !== undefined) {
    const local = new Date(date.getTime() + offset * 60_000);
    if (nameIndex(DAY_NAMES, weekday) !== local.getUTCDay()) {
      throw NativeError.custom("no possible date and time matching input");
    }
  }
  return fromDate(date);
}

function dateFromRfc3339(params: readonly Value[]): Value {
  const match = RFC3339.exec(stringParam(params, 0, 1));
  if (match === null) throw NativeError.custom("input contains invalid characters");
  const [, year = "", month = "", day = "", hour = "", minute = "", second = "", fraction = "", zone = ""] =
    match;

  const clock: WallClock = {
    year: Number(year),
    month: Number(month),
    day: Number(day),
    hour: Number(hour),
    minute: Number(minute),
    second: Number(second),
    millisecond: Number(fraction.slice(0, 3).padEnd(3, "0")),
  };
  return fromDate(instantAt(clock, zoneOffset(zone)));
}

function dateToRfc2822(params: readonly Value[]): Value {
  return stringValue(formatDate(datetimeParam(params, 0, 1), "%a, %d %b %Y %H:%M:%S +0000"));
}

/** Milliseconds appear only when non-zero. */
function dateToRfc3339(params: readonly Value[]): Value {
  const date = datetimeParam(params, 0, 1);
  const millisecond = date.getUTCMilliseconds();
  const fraction = millisecond === 0 ? "" : `.${pad(millisecond, 3)}`;
  return stringValue(`${formatDate(date, "%Y-%m-%dT%H:%M:%S")}${fraction}+00:00`);
}

// ─── Construction and Parts ────────────────────────────────────────

function encodeDate(params: readonly Value[]): Value {
  const year = Math.trunc(numberParam(params, 0, 3));
  const month = Math.trunc(numberParam(params, 1, 3));
  const day = Math.trunc(numberParam(params, 2, 3));
  if (!isValidDate(year, month, day)) {
    throw NativeError.custom("invalid date parameters");
  }
  return fromDate(utcDateTime(year, month, day));
}

function encodeTime(params: readonly Value[]): Value {
  const hour = Math.trunc(numberParam(params, 0, 3));
  const minute = Math.trunc(numberParam(params, 1, 3));
  const second = Math.trunc(numberParam(params, 2, 3));
  const millisecond = Math.trunc(defaultNumber(params, 3, 0));
  if (!isValidTime(hour, minute, second, millisecond)) {
    throw NativeError.custom("invalid time parameters");
  }
  return fromDate(utcDateTime(1970, 1, 1, hour, minute, second, millisecond));
}

function incMonth(params: readonly Value[]): Value {
  const date = datetimeParam(params, 0, 1);
  const increment = Math.trunc(defaultNumber(params, 1, 1));
  return fromDate(addMonths(date, increment));
}

/** Monday is 0, Sunday is 6. */
function dayOfWeek(date: Date): number {
  return (date.getUTCDay() + 6) % 7;
}

function part(fn: (date: Date) => number): NativeFunction {
  return (params) => numberValue(fn(datetimeParam(params, 0, 1)));
}

function wholeDays(params: readonly Value[]): Value {
  return numberValue(Math.trunc(numberParam(params, 0, 1)));
}

function dayFraction(params: readonly Value[]): Value {
  const value = numberParam(params, 0, 1);
  return numberValue(value - Math.trunc(value));
}

function leapYear(params: readonly Value[]): Value {
  return booleanValue(isLeapYear(datetimeParam(params, 0, 1).getUTCFullYear()));
}

// ─── Registration ──────────────────────────────────────────────────

export function timeFunctions(): FunctionDefinition[] {
  return [
    defineFunction(wholeDays, arity.required(1), "date(datetime: Number): Number"),
    defineFunction(dayFraction, arity.required(1), "time(datetime: Number): Number"),
    defineFunction(dateToString, arity.required(2), "date_to_string(fmt: String, datetime: Number): String"),
    defineFunction(dateToString, arity.required(2), "time_to_string(fmt: String, datetime: Number): String"),
    defineFunction(stringToDate, arity.optional(1, 1), "string_to_date(date: String, format: String = '%Y-%m-%d'): Number"),
    defineFunction(stringToTime, arity.optional(1, 1), "string_to_time(time: String, format: String = '%H:%M:%S'): Number"),
    defineFunction(stringToDatetime, arity.optional(1, 1), "string_to_datetime(datetime: String, format: String = '%Y-%m-%d %H:%M:%S'): Number"),
    defineFunction(dateFromRfc2822, arity.required(1), "date_from_rfc2822(datetime: String): Number"),
    defineFunction(dateFromRfc3339, arity.required(1), "date_from_rfc3339(datetime: String): Number"),
    defineFunction(dateToRfc2822, arity.required(1), "date_to_rfc2822(datetime: Number): String"),
    defineFunction(dateToRfc3339, arity.required(1), "date_to_rfc3339(datetime: Number): String"),
    defineFunction(part(dayOfWeek), arity.required(1), "day_of_week(datetime: Number): Number"),
    defineFunction(encodeDate, arity.required(3), "encode_date(year: Number, month: Number, day: Number): Number"),
    defineFunction(encodeTime, arity.optional(3, 1), "encode_time(hour: Number, minute: Number, second: Number, millisecond: Number = 0): Number"),
    defineFunction(incMonth, arity.optional(1, 1), "inc_month(datetime: Number, increment: Number = 1): Number"),
    defineFunction(leapYear, arity.required(1), "is_leap_year(datetime: Number): Boolean"),
    defineFunction(part((date) => date.getUTCFullYear()), arity.required(1), "year(datetime: Number): Number"),
    defineFunction(part((date) => date.getUTCMonth() + 1), arity.required(1), "month(datetime: Number): Number"),
    defineFunction(part((date) => date.getUTCDate()), arity.required(1), "day(datetime: Number): Number"),
    defineFunction(part((date) => date.getUTCHours()), arity.required(1), "hour(datetime: Number): Number"),
    defineFunction(part((date) => date.getUTCMinutes()), arity.required(1), "minute(datetime: Number): Number"),
    defineFunction(part((date) => date.getUTCSeconds()), arity.required(1), "second(datetime: Number): Number"),
    defineFunction(part((date) => date.getUTCMilliseconds()), arity.required(1), "millisecond(datetime: Number): Number"),
  ];
}

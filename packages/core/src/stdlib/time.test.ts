import { describe, it, expect } from "vitest";
import { createStandardLibrary } from "./index.js";
import { evaluate } from "../engine/interpreter.js";
import { parse } from "../engine/parser.js";
import { tokenize } from "../engine/scanner.js";
import { booleanValue, numberValue, stringValue, type Value } from "../engine/value.js";

const env = createStandardLibrary({ seed: 1 });

function run(source: string): Value {
  return evaluate(env, parse(tokenize(source)));
}

const n = numberValue;

// 2007-08-09 10:11:12.013
const SAMPLE = "13734.424444594908";

describe("time functions", () => {
  describe("encode_date / encode_time", () => {
    it("count days since 1970 and fractions of a day", () => {
      expect(run("encode_date(2019, 7, 24)")).toEqual(n(18101));
      expect(run("encode_time(18, 0, 0)")).toEqual(n(0.75));
      expect(run("encode_date(2019, 7, 24) + encode_time(18, 0, 0)")).toEqual(n(18101.75));
      expect(run("encode_time(0, 0, 1, 500)")).toEqual(n(1500 / 86_400_000));
    });

    it("reject impossible dates and times", () => {
      expect(() => run("encode_date(2023, 2, 30)")).toThrow(
        "Function 'encode_date' failed: invalid date parameters"
      );
      expect(() => run("encode_time(24, 0, 0)")).toThrow(
        "Function 'encode_time' failed: invalid time parameters"
      );
    });
  });

  it("splits a datetime into date and time", () => {
    expect(run("date(18101.75)")).toEqual(n(18101));
    expect(run("time(18101.75)")).toEqual(n(0.75));
  });

  it("extracts each part", () => {
    expect(run(`year(${SAMPLE})`)).toEqual(n(2007));
    expect(run(`month(${SAMPLE})`)).toEqual(n(8));
    expect(run(`day(${SAMPLE})`)).toEqual(n(9));
    expect(run(`hour(${SAMPLE})`)).toEqual(n(10));
    expect(run(`minute(${SAMPLE})`)).toEqual(n(11));
    expect(run(`second(${SAMPLE})`)).toEqual(n(12));
    expect(run(`millisecond(${SAMPLE})`)).toEqual(n(13));
  });

  it("numbers weekdays from Monday", () => {
    expect(run("day_of_week(18101.75)")).toEqual(n(2));
    expect(run("day_of_week(encode_date(2014, 11, 28))")).toEqual(n(4));
  });

  it("moves by months, clamping the day", () => {
    expect(run("inc_month(encode_date(2023, 12, 1)) = encode_date(2024, 1, 1)")).toEqual(
      booleanValue(true)
    );
    expect(run("inc_month(encode_date(2023, 12, 1), -1) = encode_date(2023, 11, 1)")).toEqual(
      booleanValue(true)
    );
    expect(run("inc_month(encode_date(2024, 1, 31)) = encode_date(2024, 2, 29)")).toEqual(
      booleanValue(true)
    );
  });

  it("detects leap years", () => {
    expect(run("is_leap_year(encode_date(2023, 1, 1))")).toEqual(booleanValue(false));
    expect(run("is_leap_year(encode_date(2024, 1, 1))")).toEqual(booleanValue(true));
    expect(run("is_leap_year(encode_date(1900, 1, 1))")).toEqual(booleanValue(false));
  });

  it("rejects datetimes a date cannot hold", () => {
    expect(() => run("year(0 / 0)")).toThrow("Function 'year' failed: datetime out of range");
  });

  describe("date_to_string", () => {
    it("formats with strftime specifiers", () => {
      expect(run("date_to_string('%Y-%m-%d %H:%M:%S', 18101.75)")).toEqual(
        stringValue("2019-07-24 18:00:00")
      );
      expect(run("date_to_string('%A %e %b %y', 18101)")).toEqual(
        stringValue("Wednesday 24 Jul 19")
      );
      expect(run("date_to_string('%F %T', 0.5)")).toEqual(stringValue("1970-01-01 12:00:00"));
      expect(run("time_to_string('%I:%M %p', 18101.75)")).toEqual(stringValue("06:00 PM"));
      expect(run("date_to_string('100%%', 0)")).toEqual(stringValue("100%"));
    });

    it("rejects unknown specifiers", () => {
      expect(() => run("date_to_string('%Q', 0)")).toThrow(
        "Function 'date_to_string' failed: unsupported format specifier '%Q'"
      );
    });
  });

  describe("string_to_date / string_to_time / string_to_datetime", () => {
    it("parse the default formats", () => {
      expect(run("string_to_date('2019-07-24')")).toEqual(n(18101));
      expect(run("string_to_time('12:00:00')")).toEqual(n(0.5));
      expect(run("string_to_datetime('2019-07-24 12:00:00')")).toEqual(n(18101.5));
    });

    it("parse custom formats", () => {
      expect(run("string_to_date('07/24/2019', '%m/%d/%Y')")).toEqual(n(18101));
      expect(run("string_to_date('24 July 2019', '%d %B %Y')")).toEqual(n(18101));
      expect(run("string_to_time('01:30 PM', '%I:%M %p')")).toEqual(n(0.5625));
    });

    it("describe what went wrong", () => {
      const failure = (source: string, message: string) =>
        expect(() => run(source)).toThrow(`failed: ${message}`);

      failure("string_to_date('2019-13-01')", "input is out of range");
      failure("string_to_date('2019-07')", "premature end of input");
      failure("string_to_date('2019/07/24')", "input contains invalid characters");
      failure("string_to_date('2019-07-24x')", "trailing input");
      failure("string_to_date('12:00', '%H:%M')", "input is not enough for unique date and time");
    });
  });

  describe("RFC 2822", () => {
    it("formats in UTC", () => {
      expect(run("date_to_rfc2822(16402.5)")).toEqual(
        stringValue("Fri, 28 Nov 2014 12:00:00 +0000")
      );
    });

    it("parses any offset into UTC", () => {
      expect(run("date_from_rfc2822('Fri, 28 Nov 2014 12:00:00 +0000')")).toEqual(n(16402.5));
      expect(
        run(
          "date_from_rfc2822('Fri, 28 Nov 2014 13:00:00 +0100') = date_from_rfc2822('28 Nov 2014 12:00:00 GMT')"
        )
      ).toEqual(booleanValue(true));
    });

    it("checks the weekday", () => {
      expect(() => run("date_from_rfc2822('Mon, 28 Nov 2014 12:00:00 +0000')")).toThrow(
        "Function 'date_from_rfc2822' failed: no possible date and time matching input"
      );
    });
  });

  describe("RFC 3339", () => {
    it("formats in UTC, with milliseconds only when present", () => {
      expect(run("date_to_rfc3339(16402.5)")).toEqual(stringValue("2014-11-28T12:00:00+00:00"));
      expect(run(`date_to_rfc3339(${SAMPLE})`)).toEqual(
        stringValue("2007-08-09T10:11:12.013+00:00")
      );
    });

    it("parses offsets and fractions", () => {
      expect(run("date_from_rfc3339('2014-11-28T13:00:00+01:00')")).toEqual(n(16402.5));
      expect(run("date_from_rfc3339('2007-08-09T10:11:12.013Z')")).toEqual(
        n(1186654272013 / 86_400_000)
      );
    });

    it("rejects other layouts", () => {
      expect(() => run("date_from_rfc3339('2014-11-28')")).toThrow(
        "Function 'date_from_rfc3339' failed: input contains invalid characters"
      );
    });
  });
});

import { describe, it, expect } from "vitest";
import { ErrorHandler, ErrorLevel } from "../src/logging/error-handler";
import { ConfigurationError, ConfigValidationError } from "../src/core/errors";

function capture(minLevel?: ErrorLevel) {
  const lines: string[] = [];
  const handler = new ErrorHandler(minLevel, (line) => lines.push(line));
  return { handler, lines };
}

describe("ErrorHandler", () => {
  it("writes timestamped lines at or above the minimum level", () => {
    const { handler, lines } = capture(ErrorLevel.INFO);

    handler.log(ErrorLevel.DEBUG, "hidden");
    handler.log(ErrorLevel.WARN, "shown");

    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatch(/^\[\d{4}-\d{2}-\d{2}T[\d:.]+Z\] WARN: shown$/);
    expect(handler.getLogs()).toHaveLength(1);
  });

  it("filters and clears the buffer", () => {
    const { handler } = capture(ErrorLevel.DEBUG);

    handler.log(ErrorLevel.DEBUG, "one");
    handler.log(ErrorLevel.ERROR, "two");

    expect(handler.getLogs(ErrorLevel.ERROR).map((log) => log.message)).toEqual(["two"]);
    handler.clearLogs();
    expect(handler.getLogs()).toEqual([]);
  });

  it("reports configuration errors with their input and constraint", () => {
    const { handler, lines } = capture();

    handler.report(new ConfigurationError("rules[0]", "bad rule"));

    const [log] = handler.getLogs();
    expect(log.level).toBe(ErrorLevel.ERROR);
    expect(log.context).toEqual({ input: "rules[0]", constraint: "bad rule" });
    expect(lines[0]).toMatch(/ ERROR: rules\[0\]: bad rule$/);
  });

  it("reports validation issues", () => {
    const { handler } = capture();

    handler.report(new ConfigValidationError(["vpc_id: required"]));

    expect(handler.getLogs()[0].message).toBe("Configuration is invalid:\n- vpc_id: required");
    expect(handler.getLogs()[0].context).toEqual({ issues: ["vpc_id: required"] });
  });

  it("reports values that are not errors", () => {
    const { handler } = capture();

    handler.report("plain failure");

    expect(handler.getLogs()[0].message).toBe("plain failure");
  });
});

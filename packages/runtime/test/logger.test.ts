import { describe, expect, it } from "vitest";

import { createLogger, type LogStream } from "../src/index.js";

function capture(): { lines: Array<[LogStream, string]>; write: (stream: LogStream, line: string) => void } {
  const lines: Array<[LogStream, string]> = [];
  return {
    lines,
    write: (stream, line) => {
      lines.push([stream, line]);
    },
  };
}

describe("createLogger", () => {
  it("filters below the configured level", () => {
    const { lines, write } = capture();
    const logger = createLogger({ level: "info", color: false, write });

    logger.debug("not shown");
    logger.info("loaded 3 extensions");

    expect(lines).toEqual([["stdout", "loaded 3 extensions"]]);
  });

  it("routes warnings and errors to stderr with prefixes", () => {
    const { lines, write } = capture();
    const logger = createLogger({ level: "debug", color: false, write });

    logger.debug('loading extension "alpha" from demo');
    logger.warn("could not find requested extensions: beta");
    logger.error('could not load extension "gamma": boom');

    expect(lines).toEqual([
      ["stdout", '[debug] loading extension "alpha" from demo'],
      ["stderr", "warning: could not find requested extensions: beta"],
      ["stderr", 'error: could not load extension "gamma": boom'],
    ]);
  });

  it("prints debug data on a second line", () => {
    const { lines, write } = capture();
    const logger = createLogger({ level: "debug", color: false, write });

    logger.debug("ignoring extension", { name: "beta" });

    expect(lines).toEqual([
      ["stdout", "[debug] ignoring extension"],
      ["stdout", '{\n  "name": "beta"\n}'],
    ]);
  });

  it("writes JSON lines", () => {
    const { lines, write } = capture();
    const logger = createLogger({
      json: true,
      write,
      now: () => new Date("2024-05-01T10:00:00.000Z"),
    });

    logger.error("error calling extension \"b\": failed", { extension: "b" });
    logger.info("done");

    expect(lines).toEqual([
      [
        "stderr",
        '{"level":"error","message":"error calling extension \\"b\\": failed","timestamp":"2024-05-01T10:00:00.000Z","data":{"extension":"b"}}',
      ],
      ["stdout", '{"level":"info","message":"done","timestamp":"2024-05-01T10:00:00.000Z"}'],
    ]);
  });

  it("colors text output by default", () => {
    const { lines, write } = capture();
    const logger = createLogger({ write });

    logger.info("plain");
    logger.warn("careful");

    expect(lines[0]).toEqual(["stdout", "plain"]);
    expect(lines[1]?.[1]).not.toBe("warning: careful");
    expect(lines[1]?.[1]).toContain("careful");
  });
});

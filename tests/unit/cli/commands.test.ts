import { describe, it, expect } from "vitest";
import { InvalidArgumentError } from "commander";
import { createProgram, packageVersion, parsePort } from "../../../src/cli/commands.js";

describe("parsePort", () => {
  it("accepts ports in range", () => {
    expect(parsePort("0")).toBe(0);
    expect(parsePort("15151")).toBe(15151);
    expect(parsePort("65535")).toBe(65535);
  });

  it("rejects anything else", () => {
    for (const value of ["-1", "65536", "80.5", "http"]) {
      expect(() => parsePort(value)).toThrow(InvalidArgumentError);
    }
  });
});

describe("createProgram", () => {
  it("registers the commands", () => {
    const program = createProgram();

    expect(program.name()).toBe("chai");
    expect(program.version()).toBe(packageVersion());
    expect(program.commands.map((command) => command.name())).toEqual(["version", "init", "gateway"]);
  });

  it("reads the version from package.json", () => {
    expect(packageVersion()).toBe("0.1.0");
  });
});

import { describe, it, expect } from "vitest";
import {
  getHelpText,
  getVersion,
  parseCliArgs,
  runCommand,
  type CliIO,
} from "../../bin/valtree-cli-lib";

function io(files: Record<string, string>): CliIO {
  return {
    readFile: file => {
      const text = files[file];
      if (text === undefined) throw new Error(`ENOENT: ${file}`);
      return text;
    },
  };
}

describe("valtree CLI", () => {
  describe("argument parsing", () => {
    it("parses fmt with --pretty", () => {
      expect(parseCliArgs(["fmt", "--pretty", "a.json"])).toEqual({
        command: "fmt",
        pretty: true,
        file: "a.json",
        errors: [],
      });
    });

    it("parses get", () => {
      const parsed = parseCliArgs(["get", "user.name", "a.json"]);
      expect(parsed.command).toBe("get");
      expect(parsed.path).toBe("user.name");
      expect(parsed.file).toBe("a.json");
      expect(parsed.errors).toEqual([]);
    });

    it("parses --help and --version", () => {
      expect(parseCliArgs(["-h"]).help).toBe(true);
      expect(parseCliArgs(["--version"]).version).toBe(true);
    });

    it("collects usage errors", () => {
      expect(parseCliArgs(["get", "a.b"]).errors).toEqual(["get: missing <file>"]);
      expect(parseCliArgs(["fmt"]).errors).toEqual(["fmt: missing <file>"]);
      expect(parseCliArgs(["fmt", "a", "b"]).errors).toEqual(["fmt: too many arguments"]);
      expect(parseCliArgs(["frob"]).errors).toEqual(["Unknown command: frob"]);
      expect(parseCliArgs(["--bogus", "fmt", "a"]).errors).toEqual(["Unknown option: --bogus"]);
    });
  });

  describe("help and version", () => {
    it("describes both commands", () => {
      const help = getHelpText();
      expect(help).toContain("valtree fmt [--pretty] <file>");
      expect(help).toContain("valtree get <path> <file>");
    });

    it("reports the package version", () => {
      expect(getVersion()).toMatch(/^valtree v\d+\.\d+\.\d+$/);
    });
  });

  describe("commands", () => {
    it("re-encodes compactly", () => {
      const result = runCommand(parseCliArgs(["fmt", "a.json"]), io({ "a.json": '{ "a" : [1, 2.50] }' }));
      expect(result).toEqual({ code: 0, stdout: '{"a":[1,2.5]}\n', stderr: "" });
    });

    it("re-encodes pretty with the configured indent", () => {
      const files = io({ "a.json": '{"a":1}' });
      expect(runCommand(parseCliArgs(["fmt", "-p", "a.json"]), files).stdout).toBe('{\n  "a": 1\n}\n');
      expect(
        runCommand(parseCliArgs(["fmt", "-p", "a.json"]), { ...files, config: { codec: { indent: 1 } } }).stdout
      ).toBe('{\n "a": 1\n}\n');
    });

    it("prints the value at a path", () => {
      const files = io({ "u.json": '{"user":{"name":"Ada","tags":["x"]}}' });
      expect(runCommand(parseCliArgs(["get", "user.name", "u.json"]), files)).toEqual({
        code: 0,
        stdout: "Ada\n",
        stderr: "",
      });
      expect(runCommand(parseCliArgs(["get", "user.tags", "u.json"]), files).stdout).toBe("\n");
    });

    it("reports an unknown path", () => {
      const files = io({ "u.json": '{"user":{}}' });
      expect(runCommand(parseCliArgs(["get", "user.age", "u.json"]), files)).toEqual({
        code: 1,
        stdout: "",
        stderr: "Unknown data reference: user.age\n",
      });
    });

    it("reports malformed input", () => {
      const result = runCommand(parseCliArgs(["fmt", "bad.json"]), io({ "bad.json": "[1," }));
      expect(result.code).toBe(1);
      expect(result.stderr).toBe("Malformed JSON: unexpected end of input at line 1, column 4\n");
    });

    it("reports unreadable files", () => {
      expect(runCommand(parseCliArgs(["fmt", "gone.json"]), io({}))).toEqual({
        code: 1,
        stdout: "",
        stderr: "Cannot read gone.json: ENOENT: gone.json\n",
      });
    });

    it("exits 2 on usage errors", () => {
      const result = runCommand(parseCliArgs(["frob"]), io({}));
      expect(result.code).toBe(2);
      expect(result.stderr).toBe("Unknown command: frob\nRun 'valtree --help' for usage.\n");
      expect(runCommand(parseCliArgs([]), io({})).code).toBe(2);
    });
  });
});

import { describe, it, expect } from "vitest";
import { runCommand } from "./run-command";

describe("runCommand", () => {
  it("captures output and exit code", async () => {
    const result = await runCommand(process.execPath, [
      "-e",
      "process.stdout.write('out'); process.stderr.write('err'); process.exit(3)",
    ]);

    expect(result.success).toBe(false);
    expect(result.exitCode).toBe(3);
    expect(result.stdout).toBe("out");
    expect(result.stderr).toBe("err");
  });

  it("reports success for exit code 0", async () => {
    const result = await runCommand(process.execPath, ["-e", ""]);
    expect(result.success).toBe(true);
    expect(result.exitCode).toBe(0);
  });

  it("resolves when the command cannot be started", async () => {
    const result = await runCommand("txt2tex-no-such-command");
    expect(result.success).toBe(false);
    expect(result.exitCode).toBe(-1);
    expect(result.stderr).toContain("ENOENT");
  });
});

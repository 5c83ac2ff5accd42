import { describe, it, expect } from "vitest";
import { isRunningUnderPm2, shouldAttachCli } from "../runtime";

describe("utils/runtime", () => {
  it("detects PM2 from its environment variables", () => {
    expect(isRunningUnderPm2({ pm_id: "0" })).toBe(true);
    expect(isRunningUnderPm2({ PM2_HOME: "/tmp/pm2" })).toBe(true);
    expect(isRunningUnderPm2({})).toBe(false);
  });

  it("attaches the CLI only in an interactive terminal outside PM2", () => {
    expect(shouldAttachCli({}, true)).toBe(true);
    expect(shouldAttachCli({}, false)).toBe(false);
    expect(shouldAttachCli({ DISABLE_CLI: "true" }, true)).toBe(false);
    expect(shouldAttachCli({ NODE_APP_INSTANCE: "1" }, true)).toBe(false);
  });
});

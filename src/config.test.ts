import path from "node:path";
import { DEFAULT_CATALOG_PATH } from "./catalog.js";
import { defaultFileExtension, loadConfig, type HostInfo } from "./config.js";
import { AppError } from "./errors.js";

const linux: HostInfo = { platform: "linux", homeDir: "/home/test", isTTY: true };

describe("loadConfig", () => {
  it("falls back to the documents folder and csv", () => {
    expect(loadConfig({}, linux)).toEqual({
      logDir: "/home/test/Documents/Gym Progress",
      fileExtension: "csv",
      catalogPath: DEFAULT_CATALOG_PATH,
      maxAttempts: undefined,
      color: true,
      nodeEnv: "production",
    });
  });

  it("picks the spreadsheet extension on Windows only", () => {
    expect(defaultFileExtension("win32")).toBe("xls");
    expect(defaultFileExtension("darwin")).toBe("csv");
  });

  it("reads overrides from the environment", () => {
    const config = loadConfig(
      {
        GYM_LOG_DIR: "/srv/gym",
        GYM_LOG_FILE_EXTENSION: " XLS ",
        GYM_LOG_CATALOG: "catalogs/home.json",
        GYM_LOG_MAX_ATTEMPTS: "3",
        NO_COLOR: "1",
        NODE_ENV: "test",
      },
      linux
    );
    expect(config).toEqual({
      logDir: "/srv/gym",
      fileExtension: "xls",
      catalogPath: path.resolve("catalogs/home.json"),
      maxAttempts: 3,
      color: false,
      nodeEnv: "test",
    });
  });

  it("treats blank values as unset", () => {
    const config = loadConfig({ GYM_LOG_DIR: "  ", GYM_LOG_FILE_EXTENSION: "", GYM_LOG_MAX_ATTEMPTS: "" }, linux);
    expect(config.logDir).toBe("/home/test/Documents/Gym Progress");
    expect(config.fileExtension).toBe("csv");
    expect(config.maxAttempts).toBeUndefined();
  });

  it("turns colour off when stdout is not a terminal", () => {
    expect(loadConfig({}, { ...linux, isTTY: false }).color).toBe(false);
  });

  test.each([
    ["GYM_LOG_FILE_EXTENSION", "pdf"],
    ["GYM_LOG_MAX_ATTEMPTS", "0"],
    ["GYM_LOG_MAX_ATTEMPTS", "many"],
    ["NODE_ENV", "staging"],
  ])("rejects %s=%p", (key, value) => {
    expect(() => loadConfig({ [key]: value }, linux)).toThrow(
      expect.objectContaining({ code: "INVALID_CONFIG", details: expect.stringContaining(key) })
    );
    expect(() => loadConfig({ [key]: value }, linux)).toThrow(AppError);
  });
});

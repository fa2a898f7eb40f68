import { AppError, isAppError, reportFatalError } from "./errors.js";

describe("reportFatalError", () => {
  let errorSpy: jest.SpyInstance;

  beforeEach(() => {
    errorSpy = jest.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    errorSpy.mockRestore();
  });

  it("ends quietly when the input stream closes", () => {
    expect(reportFatalError(new AppError("Input stream closed", { code: "INPUT_CLOSED", exitCode: 0 }))).toBe(0);
    expect(errorSpy).not.toHaveBeenCalled();
  });

  it("prints the code and details of application errors", () => {
    const err = new AppError("Invalid environment configuration", {
      code: "INVALID_CONFIG",
      details: "NODE_ENV: Invalid enum value",
    });
    expect(reportFatalError(err, "production")).toBe(1);
    expect(errorSpy.mock.calls).toEqual([
      ["Error: Invalid environment configuration [INVALID_CONFIG]"],
      ["Details:", "NODE_ENV: Invalid enum value"],
    ]);
  });

  it("prints only the message of other errors outside development", () => {
    const err = Object.assign(new Error("EACCES: permission denied, open '/logs/2024-03-09.csv'"), { code: "EACCES" });
    expect(reportFatalError(err, "production")).toBe(1);
    expect(errorSpy).toHaveBeenCalledWith("Error:", "EACCES: permission denied, open '/logs/2024-03-09.csv'");
  });

  it("prints the whole error in development", () => {
    const err = new Error("disk full");
    expect(reportFatalError(err, "development")).toBe(1);
    expect(errorSpy).toHaveBeenCalledWith("Error:", err);
  });
});

describe("isAppError", () => {
  it("matches by class and optional code", () => {
    const err = new AppError("x", { code: "RETRY_LIMIT_EXCEEDED" });
    expect(isAppError(err)).toBe(true);
    expect(isAppError(err, "RETRY_LIMIT_EXCEEDED")).toBe(true);
    expect(isAppError(err, "INPUT_CLOSED")).toBe(false);
    expect(isAppError(new Error("x"))).toBe(false);
  });

  it("defaults to an operational failure with exit code 1", () => {
    const err = new AppError("boom");
    expect(err).toMatchObject({ exitCode: 1, isOperational: true, code: null, details: null, name: "AppError" });
    expect(err).toBeInstanceOf(Error);
  });
});

export type CliError = Error & { code: string };

export const makeCliError = (code: string, message: string): CliError => {
  const error = new Error(message) as CliError;
  error.code = code;
  return error;
};

export const hasErrorCode = (error: unknown): error is { code: unknown } =>
  typeof error === "object" && error !== null && "code" in error;

/** Tiny logger wrapper for consistent tags */
const debugEnabled = () => process.env.LOG_LEVEL === "debug";

export const log = {
  debug: (...a: unknown[]) => {
    if (debugEnabled()) console.debug(new Date().toISOString(), "[DEBUG]", ...a);
  },
  info: (...a: unknown[]) => console.log(new Date().toISOString(), "[INFO]", ...a),
  warn: (...a: unknown[]) => console.warn(new Date().toISOString(), "[WARN]", ...a),
  error: (...a: unknown[]) =>
    console.error(new Date().toISOString(), "[ERROR]", ...a),
};

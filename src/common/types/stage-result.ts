/**
 * Uniform outcome of a pipeline stage. Stages return this instead of
 * throwing across their boundary.
 */
export type StageResult<T> =
  | { success: true; payload: T; error?: undefined }
  | { success: false; error: string; payload?: T };

export function stageSucceeded<T>(payload: T): StageResult<T> {
  return { success: true, payload };
}

export function stageFailed<T>(error: string, payload?: T): StageResult<T> {
  return payload === undefined
    ? { success: false, error }
    : { success: false, error, payload };
}

export type GenerationStep = 'options' | 'mkdir' | 'render' | 'encode' | 'resize' | 'write';

const STEP_LABELS: Record<GenerationStep, string> = {
  options: 'validate options',
  mkdir: 'create directory',
  render: 'render',
  encode: 'encode',
  resize: 'resize',
  write: 'write',
};

export class IconGenerationError extends Error {
  readonly step: GenerationStep;
  readonly path?: string;

  constructor(step: GenerationStep, path: string | undefined, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    const target = path ? ` ${path}` : '';
    super(`Failed to ${STEP_LABELS[step]}${target}: ${reason}`, { cause });
    this.name = 'IconGenerationError';
    this.step = step;
    this.path = path;
  }
}

/** Runs `fn`, rethrowing any failure as an IconGenerationError for `step`. */
export async function atStep<T>(step: GenerationStep, path: string | undefined, fn: () => Promise<T> | T): Promise<T> {
  try {
    return await fn();
  } catch (error) {
    if (error instanceof IconGenerationError) {
      throw error;
    }
    throw new IconGenerationError(step, path, error);
  }
}

export interface ExecutionResult {
  success: boolean;
  output: string;
  error?: string;
  /** Layer names the runtime reports as touched by the code. */
  affectedLayers: string[];
  durationMs?: number;
}

/**
 * Runs generated code against the live runtime. Implementations report
 * rejected code through `success: false` and throw only when the runtime
 * cannot be reached at all.
 */
export interface ExecutionSandbox {
  init(): Promise<void>;
  execute(code: string, description?: string): Promise<ExecutionResult>;
  shutdown(): Promise<void>;
}

const ASSIGN_RE = /([A-Za-z]\w*)\s*>>/g;
const STOP_RE = /([A-Za-z]\w*)\.stop\(\)/g;

/** Player names assigned (`p1 >> ...`) or stopped (`p1.stop()`) in a code string, first occurrence order. */
export function extractAffectedLayers(code: string): string[] {
  const seen = new Set<string>();
  for (const re of [ASSIGN_RE, STOP_RE]) {
    for (const m of code.matchAll(re)) seen.add(m[1]);
  }
  return [...seen];
}

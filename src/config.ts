export { loadConfig };
export type { DemoConfig };

type DemoConfig = {
  // message hashed by the demo, as UTF-8
  message: string;
  // re-run the gadget inside Provable.runAndCheck
  checkInCircuit: boolean;
  // report constraint counts per step
  analyzeConstraints: boolean;
};

const TRUTHY = ['1', 'true', 'yes'];
const FALSY = ['0', 'false', 'no'];

/**
 * Reads the demo configuration from environment variables. Callers that want
 * a `.env` file honoured load it with dotenv first.
 */
function loadConfig(env: NodeJS.ProcessEnv = process.env): DemoConfig {
  return {
    message: env.SHA3_MESSAGE ?? 'abc',
    checkInCircuit: parseFlag(env, 'SHA3_CHECK_IN_CIRCUIT', true),
    analyzeConstraints: parseFlag(env, 'SHA3_ANALYZE_CONSTRAINTS', false),
  };
}

function parseFlag(
  env: NodeJS.ProcessEnv,
  name: string,
  defaultValue: boolean
): boolean {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return defaultValue;

  const value = raw.trim().toLowerCase();
  if (TRUTHY.includes(value)) return true;
  if (FALSY.includes(value)) return false;
  throw new Error(
    `Invalid value for ${name}: "${raw}" (expected one of ${[...TRUTHY, ...FALSY].join(', ')})`
  );
}

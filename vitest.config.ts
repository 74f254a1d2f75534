import { defineConfig } from 'vitest/config';

// ── Coverage scope definitions per workspace ──
// Vitest does NOT support per-project coverage config — it's always global.
// We parse --project from CLI args and select the right scope dynamically.

const BASE_EXCLUDE = [
  'src/**/*.test.ts',
  'src/**/*.d.ts',
  'src/__tests__/**',
]

const L7_ENTRY_POINTS = [
  'src/L7-app/cli.ts',
]

interface CoverageScope {
  include: string[]
  exclude: string[]
  reportsDirectory: string
  thresholds: { statements: number; branches: number; functions: number; lines: number }
}

const COVERAGE_SCOPES: Record<string, CoverageScope> = {
  unit: {
    include: ['src/L0-pure/**/*.ts', 'src/L1-infra/**/*.ts', 'src/L2-clients/**/*.ts', 'src/L3-services/**/*.ts', 'src/L7-app/**/*.ts'],
    exclude: [...BASE_EXCLUDE, ...L7_ENTRY_POINTS],
    reportsDirectory: 'coverage/unit',
    thresholds: { statements: 80, branches: 70, functions: 80, lines: 80 },
  },
  'integration-L3': {
    include: ['src/L2-clients/**/*.ts', 'src/L3-services/**/*.ts'],
    exclude: BASE_EXCLUDE,
    reportsDirectory: 'coverage/integration-L3',
    thresholds: { statements: 0, branches: 0, functions: 0, lines: 0 },
  },
  'integration-L7': {
    include: ['src/L7-app/**/*.ts'],
    exclude: [...BASE_EXCLUDE, ...L7_ENTRY_POINTS],
    reportsDirectory: 'coverage/integration-L7',
    thresholds: { statements: 0, branches: 0, functions: 0, lines: 0 },
  },
}

// Detect which single project is running via --project CLI arg
function getActiveProject(): string | undefined {
  const projects: string[] = []
  for (let i = 0; i < process.argv.length; i++) {
    const next = process.argv[i + 1]
    if (process.argv[i] === '--project' && next !== undefined) {
      projects.push(next)
      i++
    }
  }
  return projects.length === 1 ? projects[0] : undefined
}

const activeProject = getActiveProject()
const scope = activeProject ? COVERAGE_SCOPES[activeProject] : undefined

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    setupFiles: ['src/__tests__/setup.ts'],
    coverage: {
      provider: 'v8',
      reporter: scope
        ? ['text', 'text-summary', 'json-summary']
        : ['text', 'text-summary', 'lcov', 'html', 'json-summary'],
      include: scope?.include ?? ['src/**/*.ts'],
      exclude: scope?.exclude ?? [...BASE_EXCLUDE, ...L7_ENTRY_POINTS],
      reportsDirectory: scope?.reportsDirectory ?? 'coverage',
      thresholds: scope?.thresholds ?? { statements: 0, branches: 0, functions: 0, lines: 0 },
    },
    testTimeout: 30000,

    // ── Per-tier test projects ──
    projects: [
      {
        extends: true,
        test: {
          name: 'unit',
          include: ['src/__tests__/unit/**/*.test.ts'],
          testTimeout: 10_000,
        },
      },
      {
        extends: true,
        test: {
          name: 'integration-L3',
          include: ['src/__tests__/integration/L3/**/*.test.ts'],
          testTimeout: 30_000,
        },
      },
      {
        extends: true,
        test: {
          name: 'integration-L7',
          include: ['src/__tests__/integration/L7/**/*.test.ts'],
          testTimeout: 30_000,
        },
      },
    ],
  },
});

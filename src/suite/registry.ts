import { SetupError } from "../engine/errors.js"
import { isContainedPath } from "./fixtures.js"
import type {
  FixtureDefinition,
  HookKey,
  SuiteDefinition,
  SuiteHooks,
  SuiteStep,
  TestCaseDefinition,
} from "./types.js"

/** Member names starting with this are test cases. */
export const CASE_PREFIX = "test"

const HOOK_KEYS: readonly HookKey[] = ["beforeAll", "beforeEach", "afterEach", "afterAll"]

const noop: SuiteStep = () => undefined

const isHookKey = (value: string): value is HookKey => HOOK_KEYS.some((key) => key === value)

const isStep = (value: unknown): value is SuiteStep => typeof value === "function"

export interface SuiteBuilder {
  test(name: string, run: SuiteStep): SuiteBuilder
  beforeAll(run: SuiteStep): SuiteBuilder
  beforeEach(run: SuiteStep): SuiteBuilder
  afterEach(run: SuiteStep): SuiteBuilder
  afterAll(run: SuiteStep): SuiteBuilder
  fixture(name: string, content: string): SuiteBuilder
}

class SuiteDraft {
  // Arrays and Map keep insertion order, which is the execution order.
  private readonly cases: TestCaseDefinition[] = []
  private readonly caseNames = new Set<string>()
  private readonly hooks = new Map<HookKey, SuiteStep>()
  private readonly fixtures: FixtureDefinition[] = []

  constructor(private readonly name: string) {
    if (name.trim().length === 0) {
      throw new SetupError(name, "register", "Suite name must not be empty")
    }
  }

  addCase(name: string, run: SuiteStep): void {
    if (this.caseNames.has(name)) {
      throw new SetupError(this.name, "register", `Duplicate test case "${name}" in suite ${this.name}`)
    }
    this.caseNames.add(name)
    this.cases.push({ name, run })
  }

  setHook(key: HookKey, run: SuiteStep): void {
    if (this.hooks.has(key)) {
      throw new SetupError(this.name, "register", `Hook ${key} defined twice in suite ${this.name}`)
    }
    this.hooks.set(key, run)
  }

  addFixture(name: string, content: string): void {
    if (!isContainedPath(name)) {
      throw new SetupError(this.name, "register", `Fixture "${name}" must be a relative path inside the scratch directory`)
    }
    if (this.fixtures.some((fixture) => fixture.name === name)) {
      throw new SetupError(this.name, "register", `Duplicate fixture "${name}" in suite ${this.name}`)
    }
    this.fixtures.push({ name, content })
  }

  finish(): SuiteDefinition {
    const hooks: SuiteHooks = {
      beforeAll: this.hooks.get("beforeAll") ?? noop,
      beforeEach: this.hooks.get("beforeEach") ?? noop,
      afterEach: this.hooks.get("afterEach") ?? noop,
      afterAll: this.hooks.get("afterAll") ?? noop,
    }
    return { name: this.name, cases: [...this.cases], hooks, fixtures: [...this.fixtures] }
  }
}

/**
 * Declares a suite through a builder. Cases run in the order `test` is
 * called; later cases may rely on state left behind by earlier ones.
 */
export const defineSuite = (name: string, build: (suite: SuiteBuilder) => void): SuiteDefinition => {
  const draft = new SuiteDraft(name)
  const builder: SuiteBuilder = {
    test: (caseName, run) => {
      draft.addCase(caseName, run)
      return builder
    },
    beforeAll: (run) => {
      draft.setHook("beforeAll", run)
      return builder
    },
    beforeEach: (run) => {
      draft.setHook("beforeEach", run)
      return builder
    },
    afterEach: (run) => {
      draft.setHook("afterEach", run)
      return builder
    },
    afterAll: (run) => {
      draft.setHook("afterAll", run)
      return builder
    },
    fixture: (fixtureName, content) => {
      draft.addFixture(fixtureName, content)
      return builder
    },
  }
  build(builder)
  return draft.finish()
}

/**
 * Builds a suite from an object literal. Members named `test…` become cases in
 * the object's own key order; hook members are picked up by name.
 */
export const suiteFromObject = (name: string, members: Readonly<Record<string, unknown>>): SuiteDefinition => {
  const draft = new SuiteDraft(name)
  for (const [key, value] of Object.entries(members)) {
    if (isHookKey(key)) {
      if (!isStep(value)) {
        throw new SetupError(name, "register", `Hook ${key} in suite ${name} is not a function`)
      }
      draft.setHook(key, (context) => value.call(members, context))
      continue
    }
    if (!key.startsWith(CASE_PREFIX)) continue
    if (!isStep(value)) {
      throw new SetupError(name, "register", `Test case ${key} in suite ${name} is not a function`)
    }
    draft.addCase(key, (context) => value.call(members, context))
  }
  return draft.finish()
}

export interface SuiteListing {
  readonly suite: string
  readonly cases: readonly string[]
}

export class SuiteRegistry {
  private readonly suites = new Map<string, SuiteDefinition>()

  get size(): number {
    return this.suites.size
  }

  register(suite: SuiteDefinition): this {
    if (this.suites.has(suite.name)) {
      throw new SetupError(suite.name, "register", `Suite ${suite.name} is already registered`)
    }
    this.suites.set(suite.name, suite)
    return this
  }

  all(): readonly SuiteDefinition[] {
    return [...this.suites.values()]
  }

  /** Keeps registration order; unknown names are ignored. */
  filter(names: readonly string[]): readonly SuiteDefinition[] {
    if (names.length === 0) return this.all()
    const wanted = new Set(names)
    return this.all().filter((suite) => wanted.has(suite.name))
  }

  list(): readonly SuiteListing[] {
    return this.all().map((suite) => ({ suite: suite.name, cases: suite.cases.map((entry) => entry.name) }))
  }
}

import { createSmokeApp } from "./app"

export { createSmokeApp, type SmokeAppDeps, type SmokeBindings } from "./app"
export { PASSED, SEEDED_KEY, SmokeCheckFailure, smokeChecks } from "./checks"
export { createSmokeContext, type SmokeContext, SmokeContextCache } from "./smoke-context"

const app = createSmokeApp()

export default {
  fetch: app.fetch,
}

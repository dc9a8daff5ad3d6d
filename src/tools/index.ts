export { SessionManager } from "../lib/session.ts";
export {
  calculateTool,
  formatResults,
  listVariablesTool,
  resetVariablesTool,
} from "./calculate.ts";
export { clearSessionTool, listSessionsTool } from "./sessions.ts";

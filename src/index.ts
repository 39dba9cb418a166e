#!/usr/bin/env node
import { createProgram } from "./cli/program.js";
import { createCliMain, isCliInvocation } from "./cli/bootstrap.js";

// Library exports
export {
  resolveInvocation,
  runInvocation,
  xmlMutation
} from "@xpath-edit/xml-mutations";
export type {
  InvocationParameters,
  XmlInvocation,
  XmlOutcome
} from "@xpath-edit/xml-mutations";

const main = createCliMain(createProgram);

if (isCliInvocation(process.argv, import.meta.url)) {
  void main();
}

// CLI exports
export { main, isCliInvocation };

#!/usr/bin/env node
import { createValidateSkillProgram } from "./cli/program.js";
import { createCliMain, isCliInvocation } from "./cli/bootstrap.js";

const main = createCliMain(createValidateSkillProgram);

if (isCliInvocation(process.argv, import.meta.url)) {
  void main();
}

export { main };

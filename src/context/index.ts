export { BASTION_EXTENSION, createRunContext, type RunContext, type RunContextOptions } from "./manager.js";

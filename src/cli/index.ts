export { type CliDeps, main as runCli } from "../main.js";

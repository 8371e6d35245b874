export { devLog, devWarn, devError, setDebugEnabled } from "./debug-log.js";

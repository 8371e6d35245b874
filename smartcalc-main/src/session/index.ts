export { CalcSession, ERROR_MESSAGES, HELP_TEXT, type SessionReply } from "./calc-session.js";

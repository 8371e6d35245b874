import { main } from "./app/main.js";

main().catch((err: unknown) => {
  console.error("SmartCalc failed to start:", err);
  process.exitCode = 1;
});

import { createProgram } from "./cli";

createProgram()
  .parseAsync(process.argv)
  .catch((err) => {
    console.error("fatal error:", err);
    process.exit(1);
  });

import { run } from "./cli.js";

run(process.argv.slice(2), process.env)
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err) => {
    console.error("Fatal error:", err);
    process.exit(1);
  });

import { main } from "./cli";

main(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error("[CLI] Fatal:", error);
    process.exitCode = 1;
  }
);

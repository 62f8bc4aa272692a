import { main } from "./main";

main(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error("Vendor register run failed", error);
    process.exitCode = 1;
  }
);

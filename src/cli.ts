#!/usr/bin/env node
import "dotenv/config";

import { main } from "./index";

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((e) => {
    console.error(e);
    process.exitCode = 1;
  });

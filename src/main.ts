#!/usr/bin/env node

import { defineCommand, runMain } from "citty"

import { start } from "./start"

const main = defineCommand({
  meta: {
    name: "graceful-listener",
    description:
      "TCP echo server that stops accepting on SIGTERM and drains open connections",
  },
  subCommands: { start },
})

await runMain(main)

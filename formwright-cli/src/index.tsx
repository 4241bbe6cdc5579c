import React from "react";
import { resolve } from "node:path";
import { render } from "ink";
import { startSession } from "@formwright/main";
import { App } from "./app/app.js";

async function main(): Promise<void> {
  const schemaArg = process.argv[2];
  const session = await startSession(schemaArg ? { schemaPath: resolve(schemaArg) } : {});

  const instance = render(<App session={session} formId={session.automaton.inputTree.root.id} />);
  try {
    await instance.waitUntilExit();
  } finally {
    await session.shutdown();
  }
}

main()
  .then(() => {
    process.exitCode = 0;
  })
  .catch((err: unknown) => {
    console.error(err instanceof Error ? `${err.name}: ${err.message}` : err);
    process.exitCode = 1;
  });

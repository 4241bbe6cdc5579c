import React, { useCallback, useState } from "react";
import { Box, useApp, useStdout } from "ink";
import { Header } from "./components/header.js";
import { MessageList } from "./components/message-list.js";
import { ChatInput } from "./components/chat-input.js";
import { StatusBar } from "./components/status-bar.js";
import { useSession } from "./hooks/use-session.js";
import type { LoopSession } from "./types.js";

// Header and input are bordered boxes (3 rows each) plus the status row.
const CHROME_ROWS = 7;
const MIN_ROWS = 12;

type Props = {
  readonly session: LoopSession;
  readonly formId: string;
};

export function App({ session, formId }: Props): React.JSX.Element {
  const { exit } = useApp();
  const { stdout } = useStdout();
  const [draft, setDraft] = useState("");
  const { messages, isLoading, remaining, submit } = useSession({ session, onExit: exit });

  const handleSubmit = useCallback(
    (value: string) => {
      setDraft("");
      submit(value);
    },
    [submit],
  );

  const rows = Math.max(stdout.rows ?? 24, MIN_ROWS);
  const columns = stdout.columns ?? 80;

  return (
    <Box flexDirection="column" height={rows}>
      <Header formId={formId} />
      <MessageList messages={messages} height={rows - CHROME_ROWS} width={columns - 2} />
      <StatusBar isLoading={isLoading} remainingFields={remaining} />
      <ChatInput value={draft} disabled={isLoading} onChange={setDraft} onSubmit={handleSubmit} />
    </Box>
  );
}

import { useState, useRef, useCallback } from "react";
import { handleLine } from "../session-loop.js";
import type { ChatMessage, LoopSession } from "../types.js";

let nextId = 1;

function createMessage(
  role: ChatMessage["role"],
  content: string,
  success?: boolean,
): ChatMessage {
  return {
    id: String(nextId++),
    role,
    content,
    success,
    timestamp: Date.now(),
  };
}

type UseSessionOptions = {
  session: LoopSession;
  onExit: (error?: Error) => void;
};

type UseSessionReturn = {
  messages: ChatMessage[];
  isLoading: boolean;
  remaining: number;
  submit: (value: string) => void;
};

export function useSession({ session, onExit }: UseSessionOptions): UseSessionReturn {
  const [messages, setMessages] = useState<ChatMessage[]>(() => [
    createMessage("assistant", session.interpreter.generateStateMessage().content),
  ]);
  const [isLoading, setIsLoading] = useState(false);
  const [remaining, setRemaining] = useState(() => session.automaton.pendingFieldIds().length);
  const onExitRef = useRef(onExit);
  onExitRef.current = onExit;

  const submit = useCallback(
    (value: string) => {
      if (isLoading) return;
      if (value.trim().length > 0) {
        setMessages((prev) => [...prev, createMessage("user", value.trim())]);
      }
      setIsLoading(true);

      void handleLine(value, session)
        .then((outcome) => {
          setIsLoading(false);
          if (outcome.type === "skip") return;

          const success = outcome.type === "exit" ? true : outcome.success;
          setMessages((prev) => [
            ...prev,
            ...outcome.replies.map((reply) => createMessage("assistant", reply, success)),
          ]);
          setRemaining(session.automaton.pendingFieldIds().length);

          if (outcome.type === "exit") {
            onExitRef.current();
          }
        })
        .catch((err: unknown) => {
          setIsLoading(false);
          const error = err instanceof Error ? err : new Error(String(err));
          setMessages((prev) => [...prev, createMessage("assistant", `[error] ${error.message}`, false)]);
          onExitRef.current(error);
        });
    },
    [isLoading, session],
  );

  return { messages, isLoading, remaining, submit };
}

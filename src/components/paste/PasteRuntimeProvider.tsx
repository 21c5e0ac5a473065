import { createContext, useContext, useEffect, type ReactNode } from "react";

import type { PasteRuntime } from "@/paste/runtime";

const PasteRuntimeContext = createContext<PasteRuntime | null>(null);

interface PasteRuntimeProviderProps {
  runtime: PasteRuntime;
  children: ReactNode;
}

export function PasteRuntimeProvider(props: PasteRuntimeProviderProps) {
  const { runtime, children } = props;

  useEffect(() => {
    return () => {
      runtime.channel.dispose();
    };
  }, [runtime]);

  return <PasteRuntimeContext.Provider value={runtime}>{children}</PasteRuntimeContext.Provider>;
}

export function usePasteRuntime(): PasteRuntime {
  const runtime = useContext(PasteRuntimeContext);
  if (!runtime) {
    throw new Error("usePasteRuntime must be used inside <PasteRuntimeProvider>");
  }
  return runtime;
}

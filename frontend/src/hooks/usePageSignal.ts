import { useCallback, useEffect, useRef } from "react";

/**
 * An AbortSignal tied to the calling page's lifetime: requests started
 * from event handlers are aborted when the page unmounts (navigation).
 *
 * Returns a getter rather than the signal, because StrictMode's
 * mount → unmount → mount replaces the controller after the first abort.
 */
export function usePageSignal(): () => AbortSignal {
  const controllerRef = useRef<AbortController>(new AbortController());

  useEffect(() => {
    if (controllerRef.current.signal.aborted) {
      controllerRef.current = new AbortController();
    }
    const controller = controllerRef.current;
    return () => controller.abort();
  }, []);

  return useCallback(() => controllerRef.current.signal, []);
}

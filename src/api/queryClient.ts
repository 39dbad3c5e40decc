import { QueryClient } from '@tanstack/react-query';
import type { Item } from '../types/definition';
import { referenceToString, type Reference } from '../workspace/reference';
import { appConfig } from '../config';
import { getDefinition } from './definitions';

export const queryClient = new QueryClient({
  defaultOptions: {
    queries: {
      staleTime: 5_000,
      retry: appConfig.queryRetry,
      refetchOnWindowFocus: false,
    },
  },
});

function definitionQueryKey(ref: Reference) {
  return ['definition', referenceToString(ref)] as const;
}

/** Cached definition fetch shared by every open of the same reference. */
export function fetchDefinition(ref: Reference, client: QueryClient = queryClient): Promise<Item> {
  return client.fetchQuery({
    queryKey: definitionQueryKey(ref),
    queryFn: () => getDefinition(ref),
    staleTime: appConfig.definitionStaleTime,
  });
}

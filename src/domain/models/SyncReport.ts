export interface SyncReport {
  processedEntries: number
  updatedItems: number
  skippedIngredients: number
  autoAdded: number       // merge invocations, not distinct shopping entries
}

export function emptySyncReport(): SyncReport {
  return { processedEntries: 0, updatedItems: 0, skippedIngredients: 0, autoAdded: 0 }
}

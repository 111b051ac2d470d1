import type { ToolAnnotations } from "@modelcontextprotocol/sdk/types.js"

type MutationTraits = {
  destructive?: boolean
  idempotent?: boolean
}

// Every tool talks to the remote account, so all of them are open-world.
export function readOnlyAnnotation(title: string): ToolAnnotations {
  return {
    title,
    readOnlyHint: true,
    openWorldHint: true
  }
}

export function mutatingAnnotation(title: string, traits: MutationTraits = {}): ToolAnnotations {
  return {
    title,
    readOnlyHint: false,
    destructiveHint: traits.destructive ?? false,
    idempotentHint: traits.idempotent ?? false,
    openWorldHint: true
  }
}

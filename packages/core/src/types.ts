export type TextContent = {
  type: 'text';
  text: string;
};

/** Shape every tool handler resolves to. */
export type ToolResult = {
  content: TextContent[];
};

export function jsonResult(payload: unknown): ToolResult {
  return {
    content: [
      {
        type: 'text' as const,
        text: JSON.stringify(payload, null, 2)
      }
    ]
  };
}

export function textResult(text: string): ToolResult {
  return {
    content: [
      {
        type: 'text' as const,
        text
      }
    ]
  };
}

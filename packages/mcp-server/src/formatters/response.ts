import type { ApiResponse } from "@sales-insight/agent";

export type ToolResponse = {
  content: { type: "text"; text: string }[];
  isError?: boolean;
};

/** Failed service responses and thrown errors become isError tool results */
export function wrapResponse<T>(response: ApiResponse<T> | Error): ToolResponse {
  if (response instanceof Error) {
    return {
      content: [{ type: "text", text: JSON.stringify({ error: response.message }) }],
      isError: true,
    };
  }
  const result: ToolResponse = {
    content: [{ type: "text", text: JSON.stringify(response, null, 2) }],
  };
  if (!response.success) result.isError = true;
  return result;
}

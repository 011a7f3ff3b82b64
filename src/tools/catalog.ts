export interface ToolParameter {
  name: string;
  type: "string" | "integer";
  required: boolean;
  description: string;
}

export interface ToolDefinition {
  name: string;
  title: string;
  description: string;
  parameters: readonly ToolParameter[];
}

export const GET_PATIENT_LIST_TOOL: ToolDefinition = {
  name: "getpatientlist",
  title: "Get patient list",
  description:
    "Get a list of patients from the patient directory, optionally filtered by patient name. " +
    "Returns name, ID, age, diagnosis, medications, allergies and last update for each patient.",
  parameters: [
    {
      name: "patient_name",
      type: "string",
      required: false,
      description: "Filter by patient name (partial, case-insensitive matches)",
    },
    {
      name: "limit",
      type: "integer",
      required: false,
      description: "Maximum number of patients to return (1-100, defaults to the configured limit)",
    },
  ],
};

export const LIST_TOOLS_TOOL: ToolDefinition = {
  name: "listtools",
  title: "List tools",
  description: "List the tools this assistant can call and the arguments they take.",
  parameters: [],
};

export const TOOL_CATALOG: readonly ToolDefinition[] = [GET_PATIENT_LIST_TOOL, LIST_TOOLS_TOOL];

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { isPatientDirectoryError } from "../errors.js";
import { logger } from "../observability/logger.js";
import { render, renderError, renderToolCatalog, toPayload } from "../presentation/presenter.js";
import { GET_PATIENT_LIST_TOOL, LIST_TOOLS_TOOL } from "../tools/catalog.js";
import type { PatientTools } from "../tools/patient-tools.js";

const GetPatientListInput = {
  patient_name: z.string().optional().describe("Filter by patient name (partial, case-insensitive matches)"),
  limit: z.number().int().optional().describe("Maximum number of patients to return (1-100)"),
};

const CanonicalPatientOutput = z.object({
  id: z.string(),
  name: z.string(),
  age: z.number().int(),
  diagnosis: z.string(),
  medications: z.array(z.string()),
  allergies: z.array(z.string()),
  lastUpdated: z.string(),
  department: z.string(),
  status: z.string(),
  admitted: z.string(),
});

const GetPatientListOutput = {
  query: z.object({
    patientName: z.string().nullable(),
    limit: z.number().int().nullable(),
  }),
  count: z.number().int(),
  patients: z.array(CanonicalPatientOutput),
};

export function createMcpServer(tools: PatientTools, version = "0.1.0"): McpServer {
  const server = new McpServer({ name: "patient-directory", version });

  server.registerTool(
    GET_PATIENT_LIST_TOOL.name,
    {
      title: GET_PATIENT_LIST_TOOL.title,
      description: GET_PATIENT_LIST_TOOL.description,
      inputSchema: GetPatientListInput,
      outputSchema: GetPatientListOutput,
    },
    async ({ patient_name, limit }) => {
      try {
        const { patients, query } = await tools.getPatientList({ patientName: patient_name, limit }, { channel: "mcp" });
        return {
          content: [{ type: "text", text: render(patients, query) }],
          structuredContent: toPayload(patients, query),
        };
      } catch (err) {
        if (!isPatientDirectoryError(err)) {
          logger.error({ err }, `[${GET_PATIENT_LIST_TOOL.name}] tool error`);
        }
        return {
          isError: true,
          content: [{ type: "text", text: renderError(err) }],
        };
      }
    },
  );

  server.registerTool(
    LIST_TOOLS_TOOL.name,
    {
      title: LIST_TOOLS_TOOL.title,
      description: LIST_TOOLS_TOOL.description,
      inputSchema: {},
    },
    async () => ({
      content: [{ type: "text", text: renderToolCatalog() }],
    }),
  );

  return server;
}

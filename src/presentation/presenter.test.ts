import { describe, expect, it } from "vitest";
import { MalformedResponseError, UpstreamStatusError, UpstreamUnreachableError } from "../errors.js";
import type { CanonicalPatient } from "../mapping/types.js";
import {
  render,
  renderError,
  renderGreeting,
  renderToolCatalog,
  renderUnknown,
  scanRenderedPatients,
  toPayload,
} from "./presenter.js";

const john: CanonicalPatient = {
  id: "P1",
  name: "John",
  age: 0,
  diagnosis: "N/A",
  medications: [],
  allergies: [],
  lastUpdated: "N/A",
  department: "N/A",
  status: "N/A",
  admitted: "N/A",
};

const jane: CanonicalPatient = {
  id: "P002",
  name: "Jane Smith",
  age: 32,
  diagnosis: "Asthma, Seasonal Allergies",
  medications: ["Albuterol Inhaler", "Claritin 10mg"],
  allergies: ["Pollen"],
  lastUpdated: "2024-01-14T14:20:00Z",
  department: "pulmonology",
  status: "active",
  admitted: "2024-01-10",
};

describe("render", () => {
  it("prints every field with its label, defaults included", () => {
    expect(render([john], { nameFilter: "Jo", limit: 5 })).toBe(
      [
        'Found 1 patient(s) matching "Jo" (limit 5):',
        "",
        "📋 Patient #1",
        "   👤 Name: John",
        "   🆔 ID: P1",
        "   🎂 Age: 0",
        "   🏥 Diagnosis: N/A",
        "   💊 Medications: None reported",
        "   ⚠️ Allergies: None reported",
        "   📅 Last Updated: N/A",
        "   🏢 Department: N/A",
        "   📊 Status: N/A",
        "   📆 Admitted: N/A",
      ].join("\n"),
    );
  });

  it("numbers patients in order", () => {
    const lines = render([john, jane]).split("\n");
    expect(lines[0]).toBe("Found 2 patient(s):");
    expect(lines.filter((line) => line.startsWith("📋"))).toEqual(["📋 Patient #1", "📋 Patient #2"]);
    expect(lines).toContain("   💊 Medications: Albuterol Inhaler, Claritin 10mg");
  });

  it("reports an empty set as no match rather than a failure", () => {
    expect(render([], { nameFilter: "Smith" })).toBe('🔍 No patients found matching "Smith".');
    expect(render([])).toBe("🔍 No patients found matching the specified criteria.");
  });

  it("can be scanned back into the same field values", () => {
    expect(scanRenderedPatients(render([john, jane], { limit: 2 }))).toEqual([john, jane]);
  });

  it("keeps list elements that contain commas apart", () => {
    const dosed: CanonicalPatient = { ...jane, medications: ["Metformin 500mg, twice daily", "Aspirin"] };
    const text = render([dosed]);
    expect(text.split("\n")).toContain("   💊 Medications: Metformin 500mg\\, twice daily, Aspirin");
    expect(scanRenderedPatients(text)).toEqual([dosed]);
  });

  it("scans back values with line breaks, backslashes and the empty-list marker", () => {
    const odd: CanonicalPatient = {
      ...jane,
      diagnosis: "Asthma\nsee notes",
      department: "C:\\ward\\4",
      allergies: ["None reported"],
      medications: ["a\\,b"],
    };
    const text = render([odd]);
    expect(text.split("\n")).toContain("   🏥 Diagnosis: Asthma\\nsee notes");
    expect(scanRenderedPatients(text)).toEqual([odd]);
  });
});

describe("toPayload", () => {
  it("echoes the query and copies the patients", () => {
    const payload = toPayload([jane], { limit: 3 });
    expect(payload).toEqual({ query: { patientName: null, limit: 3 }, count: 1, patients: [jane] });
    expect(payload.patients[0]?.medications).not.toBe(jane.medications);
  });
});

describe("renderError", () => {
  it("gives each upstream failure its own message", () => {
    expect(renderError(new UpstreamUnreachableError("http://directory.internal/api"))).toBe(
      "❌ The patient directory could not be reached. Please try again in a moment.",
    );
    expect(renderError(new MalformedResponseError("null"))).toBe(
      "❌ The patient directory returned data in a format that could not be read.",
    );
    expect(renderError(new UpstreamStatusError(503, "maintenance"))).toBe(
      "❌ The patient directory rejected the request. Please check the service configuration.",
    );
  });

  it("hides the detail of unexpected errors", () => {
    expect(renderError(new Error("socket hang up at 10.0.0.4"))).toBe(
      "❌ Something went wrong while retrieving patient data. Please try again.",
    );
  });
});

describe("static replies", () => {
  it("lists every tool with its parameters", () => {
    const lines = renderToolCatalog().split("\n");
    expect(lines[0]).toBe("🛠️ Available tools:");
    expect(lines).toContain(
      "   - patient_name (string, optional): Filter by patient name (partial, case-insensitive matches)",
    );
    expect(lines.filter((line) => line.startsWith("• ")).map((line) => line.split(" ")[1])).toEqual([
      "getpatientlist",
      "listtools",
    ]);
    expect(lines[lines.length - 1]).toBe("   No arguments.");
  });

  it("greets by name when one was given", () => {
    expect(renderGreeting("Sam")).toBe(
      '👋 Hello Sam! I can search the patient directory for you. Type "help" to see what I can do.',
    );
  });

  it("quotes the unrecognized utterance", () => {
    expect(renderUnknown("  what's the weather ")).toBe(
      `🤔 I didn't understand "what's the weather". Try "find patients named Smith", or type "help" to see what I can do.`,
    );
  });
});

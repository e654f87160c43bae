import { describe, expect, it } from "vitest";
import {
  classifyProject,
  customFieldMap,
  mapProject,
  mapStatus,
  parseComments,
  parseHours,
  parseProjects,
  parseStatusUpdates,
} from "../mappers";
import { makePayload } from "@/sync/__tests__/fixtures";

describe("mapProject", () => {
  it("normalizes the project and its current status update", () => {
    const project = mapProject({
      gid: "1001",
      name: "  Portal Clientes ",
      owner: { gid: "u-1", name: "Ana Rojas" },
      due_on: "2025-07-01",
      completed: false,
      current_status_update: {
        gid: "su-1",
        status_type: "at_risk",
        created_at: "2025-06-10T09:00:00.000Z",
        created_by: { gid: "u-2", name: "Luis" },
      },
      custom_fields: [{ name: "PMO ID", display_value: "PMO-9" }],
    });

    expect(project.name).toBe("Portal Clientes");
    expect(project.ownerName).toBe("Ana Rojas");
    expect(project.dueDate).toBe("2025-07-01");
    expect(project.currentStatus).toEqual({
      status: "at_risk",
      createdAt: "2025-06-10T09:00:00.000Z",
      authorName: "Luis",
    });
    expect(project.customFields).toEqual({ "PMO ID": "PMO-9" });
  });

  it("falls back to the legacy status colour", () => {
    const project = mapProject({
      gid: "1002",
      current_status: { color: "red", created_at: "2025-06-01T00:00:00Z", author: { name: "Eva" } },
    });
    expect(project.name).toBe("(untitled)");
    expect(project.currentStatus).toEqual({
      status: "off_track",
      createdAt: "2025-06-01T00:00:00.000Z",
      authorName: "Eva",
    });
  });

  it("has no current status when Asana reports none", () => {
    expect(mapProject({ gid: "1003" }).currentStatus).toBeNull();
  });
});

describe("mapStatus", () => {
  it("maps status types and colours", () => {
    expect(mapStatus("on_hold")).toBe("on_hold");
    expect(mapStatus(null, "yellow")).toBe("at_risk");
    expect(mapStatus("complete")).toBeNull();
  });
});

describe("customFieldMap", () => {
  it("reads the first populated value of each field", () => {
    expect(
      customFieldMap([
        { name: "PMO ID", display_value: "PMO-9" },
        { name: "Horas", number_value: 5 },
        { name: "Tags", multi_enum_values: [{ name: "a" }, { name: "b" }] },
        { name: "Inicio", date_value: { date: "2025-01-02" } },
        { name: "Vacío" },
        { name: "  " },
      ]),
    ).toEqual({ "PMO ID": "PMO-9", Horas: 5, Tags: "a, b", Inicio: "2025-01-02", "Vacío": null });
  });

  it("accepts fields keyed by gid", () => {
    expect(customFieldMap({ "111": { name: "Sponsor", text_value: "María" } })).toEqual({ Sponsor: "María" });
  });

  it("is empty when the project has no custom fields", () => {
    expect(customFieldMap(undefined)).toEqual({});
  });
});

describe("classifyProject", () => {
  it("reads classification fields by name, case-insensitively", () => {
    const project = makePayload({
      startOn: "2025-01-01",
      customFields: {
        "PMO ID": "PMO-3",
        "cliente nuevo": "ACME",
        "Business Vertical": "Retail",
        "Fase del Proyecto": "3. Ejecución",
        "En plan de facturación": "Sí",
        "Horas efectivas": "80",
      },
    });

    expect(classifyProject(project)).toEqual({
      pmoId: "PMO-3",
      sponsor: null,
      clientName: "ACME",
      projectLead: null,
      projectType: null,
      country: null,
      businessVertical: "Retail",
      projectPhase: "3. Ejecución",
      inBillingPlan: true,
      startDate: "2025-01-01",
      plannedEndDate: null,
      plannedHoursTotal: null,
      effectiveHoursTotal: 80,
    });
  });

  it("leaves the billing flag unknown when the field is missing", () => {
    expect(classifyProject(makePayload()).inBillingPlan).toBeNull();
  });
});

describe("parseHours", () => {
  it("accepts numbers and decimal-comma strings", () => {
    expect(parseHours(12)).toBe(12);
    expect(parseHours("7,5 h")).toBe(7.5);
    expect(parseHours("n/a")).toBeNull();
    expect(parseHours(null)).toBeNull();
  });

  it("treats the last separator as the decimal point", () => {
    expect(parseHours("1.200,5")).toBe(1200.5);
    expect(parseHours("1,200.5")).toBe(1200.5);
    expect(parseHours("2.5")).toBe(2.5);
  });
});

describe("collections", () => {
  it("drops malformed projects and keeps the rest", () => {
    const projects = parseProjects({ data: [{ gid: "1" }, { name: "no gid" }] }, "projects");
    expect(projects.map((p) => p.gid)).toEqual(["1"]);
  });

  it("treats an unrecognised shape as empty", () => {
    expect(parseStatusUpdates("oops", "status_updates")).toEqual([]);
  });

  it("keeps only human comments on a status update", () => {
    const comments = parseComments(
      [
        { gid: "s1", resource_subtype: "comment_added", text: "Looks good", created_by: { name: "Eva" } },
        { gid: "s2", resource_subtype: "assigned", text: "assigned to Luis" },
        { gid: "s3", type: "comment", text: "legacy comment" },
      ],
      "stories",
    );
    expect(comments.map((c) => [c.gid, c.text, c.authorName])).toEqual([
      ["s1", "Looks good", "Eva"],
      ["s3", "legacy comment", null],
    ]);
  });
});

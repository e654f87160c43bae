import { describe, expect, it } from "vitest";
import { classifyScope, isClosedPhase, isClosedRecord } from "../scope";
import { NOW, daysAgo, makePayload } from "./fixtures";

const options = { businessVerticals: [], retentionDays: 30, now: NOW };

describe("classifyScope", () => {
  it("keeps open projects with a PMO id", () => {
    expect(classifyScope(makePayload(), options)).toBe("in_scope");
  });

  it("drops projects without a PMO id", () => {
    expect(classifyScope(makePayload({ customFields: {} }), options)).toBe("out_of_scope");
  });

  it("filters by business vertical, ignoring case", () => {
    const retail = makePayload({ customFields: { "PMO ID": "PMO-1", "Business Vertical": "Retail" } });
    const other = makePayload({ customFields: { "PMO ID": "PMO-1", "Business Vertical": "Banca" } });
    const filtered = { ...options, businessVerticals: ["retail"] };
    expect(classifyScope(retail, filtered)).toBe("in_scope");
    expect(classifyScope(other, filtered)).toBe("out_of_scope");
  });

  it("keeps recently closed projects", () => {
    const closed = makePayload({ completed: true, completedAt: daysAgo(10) });
    expect(classifyScope(closed, options)).toBe("closed_recent");
  });

  it("expires projects closed before the retention window", () => {
    const closed = makePayload({ completed: true, completedAt: daysAgo(45) });
    expect(classifyScope(closed, options)).toBe("closed_expired");
  });

  it("treats a terminated phase as closed, dated by last modification", () => {
    const project = makePayload({
      modifiedAt: daysAgo(60),
      customFields: { "PMO ID": "PMO-1", "Fase del Proyecto": "Terminado" },
    });
    expect(classifyScope(project, options)).toBe("closed_expired");
  });

  it("keeps closed projects with no closure date", () => {
    const closed = makePayload({ completed: true, completedAt: null, modifiedAt: null });
    expect(classifyScope(closed, options)).toBe("closed_recent");
  });
});

describe("isClosedPhase", () => {
  it("matches terminated and cancelled phases", () => {
    expect(isClosedPhase("6. Terminado")).toBe(true);
    expect(isClosedPhase("Cancelado")).toBe(true);
    expect(isClosedPhase("En ejecución")).toBe(false);
    expect(isClosedPhase(null)).toBe(false);
  });

  it("applies to stored records", () => {
    expect(isClosedRecord({ completedFlag: true, projectPhase: null })).toBe(true);
    expect(isClosedRecord({ completedFlag: false, projectPhase: "Cancelada" })).toBe(true);
    expect(isClosedRecord({ completedFlag: false, projectPhase: "Planificación" })).toBe(false);
  });
});

import { SpecializationSchema, type Specialization } from "../types.js";

const DISPLAY_NAMES = {
  GeneralMaintenance: "General Maintenance",
  Plumbing: "Plumbing",
  Electrical: "Electrical",
  HVAC: "HVAC",
  Carpentry: "Carpentry",
  Painting: "Painting",
  Locksmith: "Locksmith",
  ApplianceRepair: "Appliance Repair",
} as const satisfies Record<Specialization, string>;

const DESCRIPTIONS = {
  GeneralMaintenance: "Can handle any type of maintenance work",
  Plumbing: "Leaks, pipes, drains, toilets",
  Electrical: "Outlets, wiring, lights, circuits",
  HVAC: "Heating, cooling, ventilation",
  Carpentry: "Wood, cabinets, doors, frames",
  Painting: "Walls, ceilings, trim",
  Locksmith: "Locks, keys, security",
  ApplianceRepair: "Refrigerators, washers, dryers, ovens",
} as const satisfies Record<Specialization, string>;

const ALIASES: Record<string, Specialization> = {
  plumber: "Plumbing",
  plumbing: "Plumbing",
  electrician: "Electrical",
  electrical: "Electrical",
  hvac: "HVAC",
  "hvac technician": "HVAC",
  heating: "HVAC",
  cooling: "HVAC",
  carpenter: "Carpentry",
  carpentry: "Carpentry",
  painter: "Painting",
  painting: "Painting",
  locksmith: "Locksmith",
  "appliance repair": "ApplianceRepair",
  "appliance technician": "ApplianceRepair",
  appliancerepair: "ApplianceRepair",
  "general maintenance": "GeneralMaintenance",
  generalmaintenance: "GeneralMaintenance",
  maintenance: "GeneralMaintenance",
  general: "GeneralMaintenance",
};

/**
 * True when a worker's specialization is exactly the required one.
 */
export function isExactMatch(worker: Specialization, required: Specialization): boolean {
  return worker === required;
}

/**
 * Whether a worker with `worker` specialization may take `required` work.
 *
 * This is the only place the General Maintenance fallback is defined: an
 * exact match, or a General Maintenance worker, can handle anything.
 */
export function canHandleWork(worker: Specialization, required: Specialization): boolean {
  return isExactMatch(worker, required) || worker === "GeneralMaintenance";
}

/**
 * Normalizes free text ("plumber", "HVAC Technician", "Appliance Repair")
 * to a specialization. Unknown or blank text maps to General Maintenance.
 */
export function parseSpecialization(text: string | null | undefined): Specialization {
  const normalized = text?.trim().toLowerCase() ?? "";
  if (!normalized) return "GeneralMaintenance";

  const alias = ALIASES[normalized];
  if (alias) return alias;

  const exact = SpecializationSchema.options.find((s) => s.toLowerCase() === normalized);
  return exact ?? "GeneralMaintenance";
}

export function specializationDisplayName(specialization: Specialization): string {
  return DISPLAY_NAMES[specialization];
}

export function specializationDescription(specialization: Specialization): string {
  return DESCRIPTIONS[specialization];
}

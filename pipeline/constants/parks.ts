import type { ParkDefinition } from "../../shared/contracts.js";

export const DEFAULT_PARK_DEFINITIONS: ParkDefinition[] = [
  {
    id: "joffre-lakes",
    name: "Joffre Lakes",
    slug: "joffre-lakes-provincial-park",
    shortSlug: "joffre-lakes",
    keywords: ["joffre", "joffrey"],
    priority: 1,
    emoji: "🏔️"
  },
  {
    id: "garibaldi",
    name: "Garibaldi",
    slug: "garibaldi-provincial-park",
    shortSlug: "garibaldi",
    keywords: ["garibaldi"],
    priority: 2,
    emoji: "🗻"
  },
  {
    id: "golden-ears",
    name: "Golden Ears",
    slug: "golden-ears-provincial-park",
    shortSlug: "golden-ears",
    keywords: ["golden ears", "golden-ears"],
    priority: 3,
    emoji: "🌲"
  },
  {
    id: "mount-seymour",
    name: "Mount Seymour",
    slug: "mount-seymour-provincial-park",
    shortSlug: "mount-seymour",
    keywords: ["mount seymour", "mt. seymour", "seymour"],
    priority: 4,
    emoji: "⛰️"
  },
  {
    id: "alice-lake",
    name: "Alice Lake",
    slug: "alice-lake-provincial-park",
    shortSlug: "alice-lake",
    keywords: ["alice lake", "alice"],
    priority: 5,
    emoji: "🏞️"
  },
  {
    id: "cultus-lake",
    name: "Cultus Lake",
    slug: "cultus-lake-provincial-park",
    shortSlug: "cultus-lake",
    keywords: ["cultus lake", "cultus"],
    priority: 6,
    emoji: "🚣"
  }
];

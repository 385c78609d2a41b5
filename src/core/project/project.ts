import { z } from "zod";
import { SnapshotError } from "../../infra/errors.js";
import type { Clock, MetricsContainer } from "../../types/metrics.js";
import { AgilityQuarter } from "../metrics/agility.js";
import { CommunityQuarter, CommunityTotal } from "../metrics/community.js";
import { QuartersStore, StoreSnapshotSchema } from "../quarters/quarters-store.js";

export const PROJECT_SECTIONS = ["community", "agility"] as const;

export type ProjectSection = (typeof PROJECT_SECTIONS)[number];

export const ProjectSnapshotSchema = z.object({
  name: z.string().min(1),
  community: z.object({
    quarters: StoreSnapshotSchema.default({}),
    total: z.record(z.string(), z.number()).default({}),
  }),
  agility: z.object({
    quarters: StoreSnapshotSchema.default({}),
  }),
});

export type ProjectSnapshot = z.infer<typeof ProjectSnapshotSchema>;

export interface ProjectOptions {
  now?: Clock;
}

/**
 * Activity record of one open source project: community and agility
 * series, each bucketed by quarter.
 */
export class Project {
  readonly community: {
    quarters: QuartersStore<CommunityQuarter>;
    total: CommunityTotal;
  };
  readonly agility: {
    quarters: QuartersStore<AgilityQuarter>;
  };

  constructor(
    readonly name: string,
    options: ProjectOptions = {},
    snapshot?: ProjectSnapshot
  ) {
    const storeOptions = { now: options.now };
    this.community = {
      quarters: snapshot
        ? QuartersStore.fromJSON(CommunityQuarter, snapshot.community.quarters, storeOptions)
        : new QuartersStore(CommunityQuarter, storeOptions),
      total: new CommunityTotal(),
    };
    this.agility = {
      quarters: snapshot
        ? QuartersStore.fromJSON(AgilityQuarter, snapshot.agility.quarters, storeOptions)
        : new QuartersStore(AgilityQuarter, storeOptions),
    };
    if (snapshot) {
      this.community.total.restore(snapshot.community.total);
    }
  }

  static fromSnapshot(input: unknown, options: ProjectOptions = {}): Project {
    const result = ProjectSnapshotSchema.safeParse(input);
    if (!result.success) {
      const errors = result.error.errors.map((e) => `${e.path.join(".")}: ${e.message}`).join(", ");
      throw new SnapshotError(`Invalid project snapshot: ${errors}`);
    }
    return new Project(result.data.name, options, result.data);
  }

  quarters(section: ProjectSection): QuartersStore<MetricsContainer> {
    return section === "community" ? this.community.quarters : this.agility.quarters;
  }

  /** Close the gaps in every series once fetching is done */
  fillGaps(): void {
    this.community.quarters.fillGaps();
    this.agility.quarters.fillGaps();
  }

  toSnapshot(): ProjectSnapshot {
    return {
      name: this.name,
      community: {
        quarters: this.community.quarters.toJSON(),
        total: this.community.total.toRecord(),
      },
      agility: {
        quarters: this.agility.quarters.toJSON(),
      },
    };
  }
}

import { ClassSyncService } from "./classes.js";
import { StaffSyncService } from "./staff.js";
import { StudentSyncService } from "./students.js";
import { errorMessage } from "../../errors.js";
import { emptyStats, mergeStats, type SyncStats } from "../../types/index.js";

import type { SyncDeps } from "./reconcile.js";
import type { CacheStats } from "../../scraper/cache.js";
import type { SnapshotProvider } from "../backup.js";

// ============================================================================
// Types
// ============================================================================

export interface SyncOptions {
  /** Snapshot the database first (default true when a provider is set) */
  backup?: boolean;
  staff?: boolean;
  classes?: boolean;
  students?: boolean;
  /** Restrict the student stage to these classes */
  classIds?: number[];
}

export interface SyncProgress {
  phase: "staff" | "classes" | "students";
  current: number;
  total: number;
  currentItem?: string;
}

type ProgressCallback = (progress: SyncProgress) => void;

type ClassSource =
  | { kind: "fetched"; ids: number[] }
  | { kind: "failed" }
  | { kind: "skipped" };

export interface SyncReport {
  snapshot: string | null;
  staff: SyncStats | null;
  classes: SyncStats | null;
  students: SyncStats | null;
  parents: SyncStats | null;
  staffLinks: number;
  orphanParentsDeactivated: number;
  identityCacheSize: number;
  requestCache: CacheStats;
  durationMs: number;
  errors: string[];
}

export interface OrchestratorDeps extends SyncDeps {
  snapshots?: SnapshotProvider;
  /** Request cache counters for the report */
  cacheStats: () => CacheStats;
}

// ============================================================================
// Sync Orchestrator
// ============================================================================

/**
 * Runs the stages in order: snapshot, staff, classes, students.
 * Classes come after staff so mentor links can find their staff rows.
 */
export class SyncOrchestrator {
  private staffService: StaffSyncService;
  private classService: ClassSyncService;
  private studentService: StudentSyncService;
  private onProgress?: ProgressCallback;

  constructor(
    private deps: OrchestratorDeps,
    schoolId: number
  ) {
    this.staffService = new StaffSyncService(deps, schoolId);
    this.classService = new ClassSyncService(deps);
    this.studentService = new StudentSyncService(deps);
  }

  setProgressCallback(callback: ProgressCallback): void {
    this.onProgress = callback;
  }

  async run(options: SyncOptions = {}): Promise<SyncReport> {
    const { clock, logger, identity, snapshots } = this.deps;
    const startedAt = clock.now();

    const report: SyncReport = {
      snapshot: null,
      staff: null,
      classes: null,
      students: null,
      parents: null,
      staffLinks: 0,
      orphanParentsDeactivated: 0,
      identityCacheSize: 0,
      requestCache: this.deps.cacheStats(),
      durationMs: 0,
      errors: [],
    };

    logger.info({ options }, "Sync run started");

    try {
      if (options.backup !== false && snapshots !== undefined) {
        report.snapshot = await snapshots.createSnapshot();
      }

      if (options.staff !== false) {
        this.onProgress?.({ phase: "staff", current: 0, total: 1 });
        report.staff = await this.staffService.sync();
        this.onProgress?.({ phase: "staff", current: 1, total: 1 });
      }

      let classSource: ClassSource = { kind: "skipped" };
      if (options.classes !== false) {
        this.onProgress?.({ phase: "classes", current: 0, total: 1 });
        const classes = await this.classService.sync();
        report.classes = classes.stats;
        report.staffLinks = classes.staffLinks;
        classSource = classes.stats.fetchFailed
          ? { kind: "failed" }
          : { kind: "fetched", ids: classes.classIds };
        this.onProgress?.({ phase: "classes", current: 1, total: 1 });
      }

      if (options.students !== false) {
        const targets = await this.studentTargets(classSource, options.classIds);
        if (targets === null) {
          report.errors.push("class list unavailable, students not synced");
          logger.error("Skipping student sync: class list unavailable");
        } else {
          await this.syncStudents(targets, report);
        }
      }
    } catch (error) {
      const message = errorMessage(error);
      logger.error({ error: message }, "Sync run failed");
      report.errors.push(message);
    }

    report.identityCacheSize = identity.cacheSize();
    report.requestCache = this.deps.cacheStats();
    report.durationMs = Math.round(clock.now() - startedAt);

    logger.info(
      {
        durationMs: report.durationMs,
        identityCacheSize: report.identityCacheSize,
        requestCache: report.requestCache,
        errors: report.errors.length,
      },
      "Sync run finished"
    );
    return report;
  }

  /**
   * Class ids for the student stage. Explicit ids win unless a fresh class
   * list narrows them; a skipped class stage falls back to stored classes.
   */
  private async studentTargets(
    source: ClassSource,
    only: number[] | undefined
  ): Promise<number[] | null> {
    if (only !== undefined && only.length > 0) {
      if (source.kind !== "fetched") {
        return only;
      }
      const wanted = new Set(only);
      return source.ids.filter((id) => wanted.has(id));
    }

    switch (source.kind) {
      case "fetched":
        return source.ids;
      case "failed":
        return null;
      case "skipped": {
        const rows = await this.deps.db
          .selectFrom("class_units")
          .select("id")
          .orderBy("id")
          .execute();
        return rows.map((row) => row.id);
      }
    }
  }

  private async syncStudents(classIds: number[], report: SyncReport): Promise<void> {
    const { logger } = this.deps;
    const students = emptyStats();
    const parents = emptyStats();

    for (const [index, classId] of classIds.entries()) {
      this.onProgress?.({
        phase: "students",
        current: index,
        total: classIds.length,
        currentItem: String(classId),
      });
      const result = await this.studentService.syncClass(classId);
      mergeStats(students, result.students);
      mergeStats(parents, result.parents);
    }
    this.onProgress?.({
      phase: "students",
      current: classIds.length,
      total: classIds.length,
    });

    if (students.fetchFailed) {
      logger.warn("Skipping orphan parent cleanup: a class fetch was incomplete");
    } else {
      report.orphanParentsDeactivated =
        await this.studentService.deactivateOrphanParents();
      parents.deactivated = report.orphanParentsDeactivated;
    }

    report.students = students;
    report.parents = parents;
    logger.info({ students, parents }, "Student sync completed");
  }
}

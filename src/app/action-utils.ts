import * as z from "zod";
import dbConnect from "@/lib/mongodb";
import { mongoStore } from "@/lib/mongo-store";
import type { AppConfig } from "@/lib/config";
import type { ReleaseNotesStore } from "@/lib/store";

export interface Viewer {
  /** Staff see unpublished releases and notes. */
  isStaff: boolean;
}

export const ANONYMOUS: Viewer = { isStaff: false };

export interface ActionContext {
  /** Defaults to the MongoDB store. */
  store?: ReleaseNotesStore;
  /** Defaults to the environment configuration. */
  config?: AppConfig;
}

export type ActionResult<T> =
  | { success: true; message: string; data: T }
  | { success: false; message: string };

/**
 * The given store, or the MongoDB store once connected.
 */
export async function resolveStore(store?: ReleaseNotesStore): Promise<ReleaseNotesStore> {
  if (store) return store;
  await dbConnect();
  return mongoStore;
}

export function errorMessage(error: unknown): string {
  if (error instanceof z.ZodError) {
    return error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ");
  }
  return error instanceof Error ? error.message : "An unknown error occurred.";
}

export function failure(context: string, error: unknown): { success: false; message: string } {
  console.error(`${context}:`, error);
  return { success: false, message: `${context}: ${errorMessage(error)}` };
}

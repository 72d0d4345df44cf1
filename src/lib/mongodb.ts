import mongoose from "mongoose";
import { getConfig } from "@/lib/config";

// Reuse one connection promise for the whole process.
let connection: Promise<typeof mongoose> | null = null;

export default async function dbConnect(): Promise<typeof mongoose> {
  if (!connection) {
    const { mongodbUri } = getConfig();
    connection = mongoose.connect(mongodbUri, { bufferCommands: false });
  }

  try {
    return await connection;
  } catch (error) {
    connection = null;
    console.error("MongoDB connection failed:", error);
    throw error;
  }
}

export async function dbDisconnect(): Promise<void> {
  if (!connection) return;
  connection = null;
  await mongoose.disconnect();
}

// ============================================================
// User Model (MongoDB Schema via Mongoose)
// ============================================================
// Credential records for POST /api/token/.
//
// SECURITY FEATURES IN THIS FILE:
//   1. select: false on passwordHash → the hash is never loaded
//      unless a query asks for it with .select("+passwordHash")
//   2. email is lower-cased and unique, so "Ana@Example.com" and
//      "ana@example.com" are the same account
//
// Hashing happens in auth.service.ts; this model only stores it.
// ============================================================

import mongoose, { Schema } from "mongoose";

export interface UserDocument {
  email: string;
  name: string;
  passwordHash: string;
  isActive: boolean;
  createdAt: Date;
  updatedAt: Date;
}

const userSchema = new Schema<UserDocument>(
  {
    email: {
      type: String,
      required: [true, "Email is required"],
      unique: true,
      lowercase: true,
      trim: true,
    },
    name: {
      type: String,
      required: [true, "Name is required"],
      trim: true,
    },
    passwordHash: {
      type: String,
      required: true,
      select: false,
    },
    // Deactivated users keep their record but can no longer log in,
    // refresh, or use an access token issued earlier
    isActive: {
      type: Boolean,
      default: true,
    },
  },
  { timestamps: true }
);

export default mongoose.model<UserDocument>("User", userSchema);

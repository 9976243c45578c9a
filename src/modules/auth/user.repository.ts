import mongoose from "mongoose";
import User from "./user.model";
import { NewUser, UserCredentials, UserRecord, UserRepository } from "../../types";

interface StoredUser {
  _id: mongoose.Types.ObjectId;
  email: string;
  name: string;
  isActive: boolean;
}

const toRecord = (doc: StoredUser): UserRecord => ({
  id: doc._id.toString(),
  email: doc.email,
  name: doc.name,
  isActive: doc.isActive,
});

/** UserRepository over the mongoose User model. */
export const createMongoUserRepository = (): UserRepository => ({
  findById: async (id) => {
    // A malformed id can never match; skip the CastError round-trip
    if (!mongoose.isValidObjectId(id)) return null;
    const doc = await User.findById(id);
    return doc ? toRecord(doc) : null;
  },

  findByEmail: async (email) => {
    const doc = await User.findOne({ email: email.toLowerCase() });
    return doc ? toRecord(doc) : null;
  },

  findCredentials: async (email): Promise<UserCredentials | null> => {
    const doc = await User.findOne({ email: email.toLowerCase() }).select("+passwordHash");
    return doc ? { ...toRecord(doc), passwordHash: doc.passwordHash } : null;
  },

  create: async (user: NewUser) => {
    const doc = await User.create(user);
    return toRecord(doc);
  },
});

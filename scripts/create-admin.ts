// Create an administrator, or promote an existing account, by email.
// usage: tsx scripts/create-admin.ts <email> <phone> [firstName] [lastName]
import "dotenv/config";
import mongoose from "mongoose";

import { connectMongo } from "../src/config/db.js";
import { User } from "../src/modules/users/model.js";
import { signAccessToken } from "../src/modules/auth/tokens.js";

async function main() {
  const [email, phone, firstName = "Admin", lastName = ""] = process.argv.slice(2);
  if (!email || !phone) {
    console.error("usage: create-admin <email> <phone> [firstName] [lastName]");
    process.exit(2);
  }

  await connectMongo();

  const user = await User.findOneAndUpdate(
    { email: email.toLowerCase() },
    {
      $set: { role: "admin", isActive: true, deactivatedAt: null },
      $setOnInsert: { email, phone, firstName, lastName: lastName || "-" },
    },
    { upsert: true, new: true, runValidators: true }
  );
  if (!user) throw new Error("upsert returned no user");

  console.log(`admin ready: ${user.email} (${user.id})`);
  // handy for poking the API locally; production tokens come from the identity service
  if (process.env.NODE_ENV !== "production") {
    console.log(`dev token: ${signAccessToken({ sub: user.id, role: "admin", sid: "cli" })}`);
  }

  await mongoose.disconnect();
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});

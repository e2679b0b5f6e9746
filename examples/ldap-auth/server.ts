import "dotenv/config";

import { mongodbAdapter } from "better-auth/adapters/mongodb";
import { MongoClient } from "mongodb";
import { getApp } from "../app.js";
import { createAuth } from "./auth.js";
import { loadLdapConfigFromEnv } from "../../src/directory/config.js";

// https://www.better-auth.com/docs/adapters/mongo
// For MongoDB, we don't need to generate or migrate the schema.
const client = new MongoClient(process.env.DB_URL_AUTH || "mongodb://127.0.0.1:27017/better-auth");
const db = client.db();

const { auth, getSession } = createAuth(mongodbAdapter(db), {
    client: loadLdapConfigFromEnv(process.env),
});

const app = getApp(auth, getSession);

const port = process.env.PORT || 3000;
app.listen(port, () => {
    console.log("Server listening on port %d", port);
});

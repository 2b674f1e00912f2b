import { signAccessToken } from "../src/auth";
import { loadConfig } from "../src/config";

// usage: npm run token -- <user-id> [email]
const [userId = "22222222-2222-2222-2222-222222222222", email = "b@test.com"] = process.argv.slice(2);

const token = signAccessToken(loadConfig().jwtSecret, { id: userId, email });

console.log(token);

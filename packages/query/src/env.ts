import "dotenv/config";
import { parseEnv } from "./config";

export const env = parseEnv(process.env);

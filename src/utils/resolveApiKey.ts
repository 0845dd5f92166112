import dotenv from "dotenv";
import { ConfigError } from "../errors";

export const API_KEY_VARIABLE = "OPENAI_API_KEY";

/**
 * Find the OpenAI key. The shell environment wins; a `.env` file is read only
 * when the shell has none.
 * @param envPath - `.env` file to read instead of the one in the working directory
 * @throws ConfigError when neither source has the key
 */
export function resolveApiKey(envPath?: string): string {
	const fromShell = process.env[API_KEY_VARIABLE];
	if (fromShell) {
		console.log(`Using ${API_KEY_VARIABLE} from environment variables`);
		return fromShell;
	}

	dotenv.config({ path: envPath });

	const fromFile = process.env[API_KEY_VARIABLE];
	if (fromFile) {
		console.log(`Using ${API_KEY_VARIABLE} from .env file`);
		return fromFile;
	}

	throw new ConfigError(
		`${API_KEY_VARIABLE} not found in environment or .env file. Set it in your shell or add ${API_KEY_VARIABLE}=your_key to a .env file`,
	);
}

/**
 * One-time operator flow: authorize the app in a browser and store the
 * resulting token pair where scheduled runs will find it.
 */
import 'dotenv/config';
import { createInterface } from 'readline/promises';
import { loadEnv } from '../src/env';
import { createContainer } from '../src/services/container';
import { generateCodeChallenge, generateCodeVerifier, generateState } from '../src/lib/spotify';
import { completeAuthorization } from '../src/lib/authorization';

async function authorize() {
    const env = loadEnv();
    const { oauth, credentialStore } = createContainer(env);

    const verifier = generateCodeVerifier();
    const state = generateState();
    const url = oauth.buildAuthUrl(generateCodeChallenge(verifier), state);

    console.log('Open this URL, approve access, then paste the full redirect URL below:\n');
    console.log(url);
    console.log();

    const rl = createInterface({ input: process.stdin, output: process.stdout });
    try {
        const redirected = await rl.question('Redirect URL: ');
        const record = await completeAuthorization(oauth, credentialStore, {
            redirectedUrl: redirected,
            expectedState: state,
            codeVerifier: verifier,
        });
        console.log(`Credentials stored; access token valid until ${record.expiresAt.toISOString()}`);
    } finally {
        rl.close();
    }
}

authorize().catch((error: unknown) => {
    console.error('Authorization failed:', error instanceof Error ? error.message : error);
    process.exitCode = 1;
});

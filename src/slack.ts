import { WebClient } from '@slack/web-api';

/** Best-effort summary post; a no-op without SLACK_BOT_TOKEN and SLACK_CHANNEL. */
export async function postSlack(text: string, env: NodeJS.ProcessEnv = process.env): Promise<boolean> {
  const token = env.SLACK_BOT_TOKEN;
  const channel = env.SLACK_CHANNEL;
  if (!token || !channel) return false;
  const client = new WebClient(token);
  try {
    await client.chat.postMessage({ channel, text });
    return true;
  } catch (e) {
    console.warn('Slack error:', e instanceof Error ? e.message : String(e));
    return false;
  }
}

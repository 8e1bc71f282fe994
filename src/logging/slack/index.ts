export { createSlackSink, resolveWebhookUrl } from './slack-sink';

import { ChatClient, ChatRequest, contentText } from '../src/index.js';

async function main() {
  const apiKey = process.env.OPENAI_API_KEY ?? '';
  if (!apiKey) throw new Error('missing OPENAI_API_KEY');

  const client = new ChatClient(apiKey, { baseUrl: process.env.OPENAI_BASE_URL });

  const req = ChatRequest.builder(process.env.MODEL ?? 'gpt-4o-mini')
    .with('developer', 'You are a helpful assistant.')
    .with('user', 'Write a haiku about strongly typed wire formats.')
    .build();
  req.temperature = 0.2;

  const resp = await client.chat(req);

  console.log(contentText(resp.choices[0].message));
  console.log(`Prompt tokens:     ${resp.usage.prompt_tokens}`);
  console.log(`Completion tokens: ${resp.usage.completion_tokens}`);
  console.log(`Total tokens:      ${resp.usage.total_tokens}`);
}

main().catch((e) => {
  console.error(e);
  process.exit(1);
});

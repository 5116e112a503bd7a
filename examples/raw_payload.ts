import { encodeChatRequest, parseChatRequest } from '../src/index.js';

// Fields this SDK does not model survive a decode/encode cycle untouched.
const body = JSON.stringify({
  model: 'gpt-4o-mini',
  messages: [
    { role: 'user', content: [{ type: 'text', text: 'Describe this image.' }] },
    { role: 'assistant', content: null, tool_calls: [{ id: 'call_1', type: 'function' }] },
  ],
  response_format: { type: 'json_object' },
});

const req = parseChatRequest(body);
console.log('Extra request fields:', req.extra);
console.log('Re-encoded:', JSON.stringify(encodeChatRequest(req)));

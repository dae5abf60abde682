import type { IntentParameters } from '../../intent/types.js';
import type { CapabilityProvider, CapabilityResult } from '../types.js';

const HELP_TEXT = [
  'Here is what I can do:',
  'answer questions,',
  'write articles, stories and captions,',
  'generate images,',
  'post to the Facebook page, optionally with an image,',
  'and report on auto-replies and today\'s activity.',
].join(' ');

export class HelpCapability implements CapabilityProvider {
  readonly name = 'built-in';

  async invoke(): Promise<CapabilityResult> {
    return { text: HELP_TEXT };
  }
}

/** Speech happens in the browser; the core only confirms the round trip. */
export class VoiceTestCapability implements CapabilityProvider {
  readonly name = 'built-in';

  async invoke(): Promise<CapabilityResult> {
    return { text: 'Voice test completed. If you can hear this, speech output is working.' };
  }
}

const CANNED_REPLIES = [
  "Thank you for your message! I've received it and will get back to you as soon as possible.",
  "Hi there! Thanks for reaching out. I'll review your message and respond shortly.",
  "Hello! I've received your message and will get back to you soon. Thanks for getting in touch.",
];

/** Last link of the reply chain, so an inbound message always gets an acknowledgement. */
export class CannedReplyCapability implements CapabilityProvider {
  readonly name = 'canned-reply';

  async invoke(parameters: IntentParameters): Promise<CapabilityResult> {
    const body = parameters.body ?? '';
    const reply = CANNED_REPLIES[body.length % CANNED_REPLIES.length] ?? '';
    return { text: reply };
  }
}

import type { Message, MessageSource } from '@services/messages';

const message = (memberName: string, text: string): Message => ({
  memberId: memberName.toLowerCase().replace(/\s+/g, '-'),
  memberName,
  text,
  timestamp: '2024-05-01T10:00:00',
});

/** Made-up member messages shared by the pipeline and route tests */
export const SAMPLE_MESSAGES: Message[] = [
  message('Vikram Desai', 'I have 2 cars and a bike.'),
  message('Vikram Desai', 'Please book a table at Nobu for Friday.'),
  message('Amira Khan', 'My favorite restaurant is Le Bernardin.'),
  message('Amira Khan', 'We have 3 dogs and 1 cat.'),
  message('Layla Kawaguchi', 'Booked my trip to London for June 3.'),
  message('Layla Kawaguchi', 'Heading to Dubai next week.'),
  message('Hans Müller', 'Thanks for the quick help with the concierge request.'),
];

/**
 * In-process stand-in for the upstream collection.
 */
export class StaticMessageSource implements MessageSource {
  calls = 0;

  constructor(
    private readonly messages: Message[] = SAMPLE_MESSAGES,
    private readonly failure?: Error
  ) {}

  async fetchMessages(): Promise<Message[]> {
    this.calls++;
    if (this.failure) throw this.failure;
    return this.messages;
  }
}

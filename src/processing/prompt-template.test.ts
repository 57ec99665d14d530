import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { PromptTemplateError, renderPromptTemplate } from './prompt-template.js';

describe('renderPromptTemplate', () => {
  it('substitutes the named field', () => {
    assert.equal(renderPromptTemplate('Post: {tweet_text}?', { tweet_text: 'hi' }), 'Post: hi?');
  });

  it('substitutes every occurrence', () => {
    assert.equal(renderPromptTemplate('{tweet_text} / {tweet_text}', { tweet_text: 'a' }), 'a / a');
  });

  it('inserts values verbatim, braces included', () => {
    assert.equal(
      renderPromptTemplate('Post: {tweet_text}', { tweet_text: 'look {not_a_field} }{' }),
      'Post: look {not_a_field} }{'
    );
  });

  it('turns doubled braces into literal braces', () => {
    assert.equal(
      renderPromptTemplate('Reply as {{"answer": bool}} for {tweet_text}', { tweet_text: 'x' }),
      'Reply as {"answer": bool} for x'
    );
  });

  it('leaves templates without placeholders unchanged', () => {
    assert.equal(renderPromptTemplate('Is this spam?', { tweet_text: 'x' }), 'Is this spam?');
  });

  it('rejects unknown fields', () => {
    assert.throws(
      () => renderPromptTemplate('About {topic}: {tweet_text}', { tweet_text: 'x' }),
      (err: unknown) => err instanceof PromptTemplateError && err.message === "Unknown placeholder '{topic}'"
    );
  });

  it('rejects unbalanced and empty braces', () => {
    assert.throws(() => renderPromptTemplate('open { brace', { tweet_text: 'x' }), PromptTemplateError);
    assert.throws(() => renderPromptTemplate('close } brace', { tweet_text: 'x' }), PromptTemplateError);
    assert.throws(() => renderPromptTemplate('empty {} field', { tweet_text: 'x' }), PromptTemplateError);
  });
});

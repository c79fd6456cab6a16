import { expect } from 'chai';
import { parseItems, prioritize, promptLess } from '../src';

describe('Priority sorter', () => {
	const question = (a: string, b: string) => `\na) ${a}\nb) ${b}\nWhich is higher priority? [a, b] > `;

	/** Answers prompts as a person would who ranks items by the given list (first is most important). */
	function personRanking(ranking: string[]) {
		return async (prompt: string) => {
			const match = /a\) (.*)\nb\) (.*)\n/.exec(prompt);
			if (!match) {
				throw new Error('unexpected prompt: ' + prompt);
			}
			return ranking.indexOf(match[1]) < ranking.indexOf(match[2]) ? 'a' : 'b';
		};
	}

	it('should read one trimmed item per non-blank line', () => {
		expect(parseItems('  first \n\nsecond\r\n  \nthird')).to.deep.equal(['first', 'second', 'third']);
		expect(parseItems('\n \n')).to.deep.equal([]);
	});

	it('should treat "a" as higher priority', async () => {
		const ask = jest.fn(async (_: string) => ' A ');
		const write = jest.fn();
		expect(await promptLess(ask, write)('wash car', 'file taxes')).to.be.true;
		expect(ask.mock.calls).to.deep.equal([[question('wash car', 'file taxes')]]);
		expect(write.mock.calls).to.be.empty;
	});

	it('should treat "b" as the second item winning', async () => {
		const ask = jest.fn(async (_: string) => 'b');
		expect(await promptLess(ask, jest.fn())('x', 'y')).to.be.false;
	});

	it('should ask again after an invalid choice', async () => {
		const ask = jest.fn<Promise<string>, [string]>()
			.mockResolvedValueOnce('maybe')
			.mockResolvedValueOnce('')
			.mockResolvedValueOnce('b');
		const write = jest.fn();
		expect(await promptLess(ask, write)('x', 'y')).to.be.false;
		expect(ask.mock.calls).to.have.lengthOf(3);
		expect(write.mock.calls).to.deep.equal([
			['Invalid choice, must be "a" or "b", try again'],
			['Invalid choice, must be "a" or "b", try again'],
		]);
	});

	it('should list items from highest priority to lowest', async () => {
		const ranking = ['taxes', 'dentist', 'groceries', 'laundry', 'email'];
		const items = ['laundry', 'taxes', 'email', 'groceries', 'dentist'];
		const tree = await prioritize(items, promptLess(personRanking(ranking), jest.fn()));
		const output: string[] = [];
		tree.traverse(item => output.push(item));
		expect(output).to.deep.equal(ranking);
		expect(tree.count).to.equal(5);
	});
});

import { expect } from 'chai';
import { RecordLog } from '../recordLog';

describe('RecordLog', () => {
    it('snapshot returns entries in append order', () => {
        const records = new RecordLog<string>();
        records.append('shell:ls');
        records.append('reboot:');
        expect(records.snapshot()).to.deep.equal(['shell:ls', 'reboot:']);
        expect(records.length).to.equal(2);
    });

    it('snapshot is a copy', () => {
        const records = new RecordLog<string>();
        records.append('shell:ls');
        const copy = records.snapshot();
        copy.push('tampered');
        records.append('reboot:');
        expect(copy).to.deep.equal(['shell:ls', 'tampered']);
        expect(records.snapshot()).to.deep.equal(['shell:ls', 'reboot:']);
    });

    it('clear empties the log', () => {
        const records = new RecordLog<string>();
        records.append('shell:ls');
        records.clear();
        expect(records.snapshot()).to.deep.equal([]);
        expect(records.length).to.equal(0);
        records.append('reboot:');
        expect(records.snapshot()).to.deep.equal(['reboot:']);
    });

    it('waitForLength resolves immediately when enough entries exist', async () => {
        const records = new RecordLog<number>();
        records.append(1);
        expect(await records.waitForLength(1)).to.deep.equal([1]);
    });

    it('waitForLength resolves after later appends', async () => {
        const records = new RecordLog<number>();
        const pending = records.waitForLength(2);
        records.append(1);
        setImmediate(() => records.append(2));
        expect(await pending).to.deep.equal([1, 2]);
    });
});

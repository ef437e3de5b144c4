import { testSuite, expect } from 'manten';
import { createFixture, defconfig } from '../../utils.js';

const kernelTree = {
	'.config': defconfig,
	arch: {
		Kconfig: 'menu "Architecture"\n',
		x86: { Kconfig: 'config X86\n\tdef_bool y\n' },
	},
};

export default testSuite(({ describe }) => {
	describe('commands', async ({ test }) => {
		test('get prints set and unset options', async () => {
			const { fixture, kconfigProbe } = await createFixture(kernelTree);
			const { stdout } = await kconfigProbe([
				'get',
				'CONFIG_HZ',
				'CONFIG_DEBUG_INFO',
				'CONFIG_CC_VERSION_TEXT',
				'--kdir',
				fixture.path,
			]);

			expect(stdout).toBe([
				'CONFIG_HZ=250',
				'# CONFIG_DEBUG_INFO is not set',
				'CONFIG_CC_VERSION_TEXT=gcc (GCC) 13.2.0',
			].join('\n'));
			await fixture.rm();
		});

		test('enabled sets the exit code', async () => {
			const { fixture, kconfigProbe } = await createFixture(kernelTree);

			const enabled = await kconfigProbe(['enabled', 'CONFIG_SMP', '-k', fixture.path]);
			expect(enabled.exitCode).toBe(0);
			expect(enabled.stdout).toBe('✓ CONFIG_SMP is enabled');

			const builtAsModule = await kconfigProbe(['enabled', 'CONFIG_EXT4_FS', '-k', fixture.path], { reject: false });
			expect(builtAsModule.exitCode).toBe(1);
			expect(builtAsModule.stdout).toBe('✗ CONFIG_EXT4_FS is not enabled');

			const quiet = await kconfigProbe(['enabled', 'CONFIG_HZ', '--quiet', '-k', fixture.path], { reject: false });
			expect(quiet.exitCode).toBe(1);
			expect(quiet.stdout).toBe('');
			await fixture.rm();
		});

		test('arch prints the architecture', async () => {
			const { fixture, kconfigProbe } = await createFixture(kernelTree);
			const { stdout } = await kconfigProbe(['arch', '-k', fixture.path]);

			expect(stdout).toBe('x86');
			await fixture.rm();
		});

		test('arch reads KDIR', async () => {
			const { fixture, kconfigProbe } = await createFixture(kernelTree);
			const { stdout } = await kconfigProbe(['arch'], {
				env: { KDIR: fixture.path },
			});

			expect(stdout).toBe('x86');
			await fixture.rm();
		});

		test('list filters options', async () => {
			const { fixture, kconfigProbe } = await createFixture(kernelTree);

			const enabled = await kconfigProbe(['list', '--enabled', '-k', fixture.path]);
			expect(enabled.stdout).toBe('CONFIG_X86=y\nCONFIG_X86_64=y\nCONFIG_SMP=y');

			const prefixed = await kconfigProbe(['list', '--prefix', 'CONFIG_X86', '-k', fixture.path]);
			expect(prefixed.stdout).toBe('CONFIG_X86=y\nCONFIG_X86_64=y');
			await fixture.rm();
		});

		test('info summarizes the configuration', async () => {
			const { fixture, kconfigProbe } = await createFixture(kernelTree);
			const { stdout } = await kconfigProbe(['info', '-k', fixture.path]);

			expect(stdout).toMatch('Options:          7');
			expect(stdout).toMatch('Built in (=y):    3');
			expect(stdout).toMatch('Modules (=m):     1');
			expect(stdout).toMatch('Architecture:     x86');
			await fixture.rm();
		});

		test('kdir setting is the default kernel directory', async () => {
			const { fixture, kconfigProbe } = await createFixture(kernelTree);

			await kconfigProbe(['config', 'set', `kdir=${fixture.path}`]);
			const { stdout: setting } = await kconfigProbe(['config', 'get', 'kdir']);
			expect(setting).toBe(`kdir=${fixture.path}`);

			const { stdout } = await kconfigProbe(['arch']);
			expect(stdout).toBe('x86');
			await fixture.rm();
		});
	});
});

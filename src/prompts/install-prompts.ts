export interface InstallAnswers {
  modules: string[];
  confirm: boolean;
}

export interface ModuleChoice {
  name: string;
  title: string;
  icon: string;
  installed: boolean;
}

export async function runInstallPrompts(choices: ModuleChoice[]): Promise<InstallAnswers> {
  const inquirer = await import('inquirer');

  return inquirer.default.prompt<InstallAnswers>([
    {
      type: 'checkbox',
      name: 'modules',
      message: '설치할 모듈을 선택하세요:',
      choices: choices.map(c => ({
        name: `${c.icon} ${c.title}${c.installed ? ' (설치됨)' : ''}`,
        value: c.name,
        checked: !c.installed,
      })),
    },
    {
      type: 'confirm',
      name: 'confirm',
      message: '선택한 모듈을 설치하시겠습니까?',
      default: true,
    },
  ]);
}

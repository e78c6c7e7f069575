import { describe, it, expect } from 'vitest';
import { projectFileXml } from '@envstage/testing';
import {
  appendElement,
  childElements,
  createElement,
  createProjectDocument,
  getAttribute,
  parseXmlDocument,
  quoteAttributeValue,
  rawText,
  serializeXmlDocument,
  setElementText,
} from '../xml-document.js';
import { CorruptMetadataError } from '../../errors.js';

const sample = projectFileXml([{ include: 'App.config', copyToOutput: 'PreserveNewest' }]);

const handWritten = [
  '<?xml version="1.0" encoding="utf-8"?>',
  '<Project ToolsVersion="15.0" DefaultTargets="Build" xmlns="http://schemas.microsoft.com/developer/msbuild/2003">',
  '  <!-- Portfolio service host -->',
  '  <PropertyGroup>',
  "    <Configuration Condition=\" '$(Configuration)' == '' \">Debug</Configuration>",
  '    <DefineConstants>DEBUG;TRACE</DefineConstants>',
  '    <PostBuildEvent>xcopy "$(TargetDir)*.dll" "D:\\Services\\Portfolio\\" /Y</PostBuildEvent>',
  '  </PropertyGroup>',
  '  <ItemGroup>',
  '    <Content Include="Assets\\Terms &amp; Conditions.txt">',
  '      <CopyToOutputDirectory>PreserveNewest</CopyToOutputDirectory>',
  '    </Content>',
  '  </ItemGroup>',
  "  <Target Name=\"AfterBuild\" Condition=\"'$(Configuration)' == 'Release'\">",
  '    <Message Text="Built &quot;$(AssemblyName)&quot;" Importance="high">done</Message>',
  '  </Target>',
  '</Project>',
  '',
].join('\r\n');

const execTarget = (exec: string) =>
  projectFileXml().replace('</Project>', `  <Target Name="AfterBuild">\n    ${exec}\n  </Target>\n</Project>`);

describe('parseXmlDocument', () => {
  it('reads the root and the document layout', () => {
    const document = parseXmlDocument(sample, 'Svc.csproj');

    expect(document.root.name).toBe('Project');
    expect(document.root.attributes.ToolsVersion).toBe('15.0');
    expect(document.format).toEqual({ newline: '\n', indentUnit: '  ', finalNewline: true });
    expect(childElements(document.root).map((element) => element.name)).toEqual(['PropertyGroup', 'ItemGroup']);
  });

  it('detects CRLF line breaks and tab indentation', () => {
    const text = sample.replace(/ {2}/g, '\t').replace(/\n/g, '\r\n');
    const document = parseXmlDocument(text, 'Svc.csproj');

    expect(document.format).toEqual({ newline: '\r\n', indentUnit: '\t', finalNewline: true });
  });

  it('rejects malformed markup', () => {
    expect(() => parseXmlDocument('<Project><ItemGroup></Project>', 'Svc.csproj')).toThrow(CorruptMetadataError);
  });

  it('rejects an unexpected root element', () => {
    expect(() => parseXmlDocument('<configuration />', 'Svc.csproj')).toThrow(
      'Corrupt project metadata in Svc.csproj: expected <Project> root, found <configuration>'
    );
  });
});

describe('serializeXmlDocument', () => {
  it('writes an untouched document back as it was read', () => {
    expect(serializeXmlDocument(parseXmlDocument(sample, 'Svc.csproj'))).toBe(sample);
  });

  it('writes a hand-written project file back unchanged', () => {
    expect(serializeXmlDocument(parseXmlDocument(handWritten, 'Portfolio.Service.csproj'))).toBe(handWritten);
  });

  it('escapes double quotes from single-quoted attributes', () => {
    const text = execTarget(`<Exec Command='copy "a.txt" "b.txt"' />`);
    const written = serializeXmlDocument(parseXmlDocument(text, 'Svc.csproj'));

    expect(written).toBe(execTarget('<Exec Command="copy &quot;a.txt&quot; &quot;b.txt&quot;"/>'));

    const reparsed = parseXmlDocument(written, 'Svc.csproj');
    const [target] = childElements(reparsed.root, 'Target');
    const [exec] = target ? childElements(target, 'Exec') : [];
    expect(exec && getAttribute(exec, 'Command')).toBe('copy &quot;a.txt&quot; &quot;b.txt&quot;');
    expect(serializeXmlDocument(reparsed)).toBe(written);
  });

  it('keeps CRLF documents in CRLF', () => {
    const text = sample.replace(/\n/g, '\r\n');
    expect(serializeXmlDocument(parseXmlDocument(text, 'Svc.csproj'))).toBe(text);
  });

  it('writes a fresh project document', () => {
    expect(serializeXmlDocument(createProjectDocument())).toBe(
      '<?xml version="1.0" encoding="utf-8"?>\r\n' +
        '<Project ToolsVersion="Current" xmlns="http://schemas.microsoft.com/developer/msbuild/2003">\r\n' +
        '</Project>\r\n'
    );
  });
});

describe('element helpers', () => {
  it('escapes text and compares unescaped values', () => {
    const element = createElement('StartArguments', {}, 'a&b <c>');

    expect(rawText(element)).toBe('a&amp;b &lt;c&gt;');
    expect(setElementText(element, 'a&b <c>')).toBe(false);
    expect(setElementText(element, 'other')).toBe(true);
    expect(rawText(element)).toBe('other');
  });

  it('quotes attribute values without touching entities', () => {
    expect(quoteAttributeValue('say "hi" &amp; go')).toBe('say &quot;hi&quot; &amp; go');
  });

  it('indents appended elements like their siblings', () => {
    const document = parseXmlDocument(sample, 'Svc.csproj');
    const item = createElement('Content', { Include: 'extra.json' });
    item.children.push(createElement('CopyToOutputDirectory', {}, 'Always'));
    const group = createElement('ItemGroup');
    group.children.push(item);
    appendElement(document.root, group, 0, document.format);

    expect(serializeXmlDocument(document)).toBe(
      sample.replace(
        '</Project>',
        '  <ItemGroup>\n' +
          '    <Content Include="extra.json">\n' +
          '      <CopyToOutputDirectory>Always</CopyToOutputDirectory>\n' +
          '    </Content>\n' +
          '  </ItemGroup>\n' +
          '</Project>'
      )
    );
  });
});

import ExamLog from '@/components/ExamLog';

export default function ExamsPage() {
  return (
    <div>
      <h1>Practice exams</h1>
      <ExamLog />
    </div>
  );
}
